/**
 * @module routes/tasks
 * @description Follow-up tasks
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    FILTER_ALL,
    idParamSchema,
    RECORD_DEFAULTS,
    taskInputSchema,
    tasksListQuerySchema,
    todayDateString,
    type TasksListResponse,
} from '@storekeep/shared';
import { authenticateToken } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import {
    createTaskKysely,
    deleteTaskKysely,
    getTaskKysely,
    listTasksKysely,
    updateTaskKysely,
} from '../db/queries/index.js';
import { assertCustomerRef } from '../utils/customerUtils.js';
import { NotFoundError } from '../utils/errors.js';
import { parseInput } from '../utils/validation.js';
import { taskLogger } from '../utils/logger.js';

const router: Router = Router();

router.use(authenticateToken);

router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(tasksListQuerySchema, req.query);

    const tasks = await listTasksKysely(req.db, {
        status: query.status_filter === FILTER_ALL ? undefined : query.status_filter,
        search: query.search,
        startDate: query.start_date,
        endDate: query.end_date,
    });

    const body: TasksListResponse = { tasks };
    res.json(body);
}));

router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);

    const task = await getTaskKysely(req.db, id);
    if (!task) {
        throw new NotFoundError('Task not found', 'Task', id);
    }

    res.json(task);
}));

router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const { date, status, ...input } = parseInput(taskInputSchema, req.body);
    await assertCustomerRef(req.db, input.customerId);

    const created = await createTaskKysely(req.db, {
        ...input,
        date: date ?? todayDateString(),
        status: status ?? RECORD_DEFAULTS.taskStatus,
    });

    taskLogger.info({ taskId: created.id }, 'Task created');
    res.status(201).json(await getTaskKysely(req.db, created.id));
}));

router.put('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { date, status, ...input } = parseInput(taskInputSchema, req.body);
    await assertCustomerRef(req.db, input.customerId);

    // Omitted date and status keep their stored values
    const updated = await updateTaskKysely(req.db, id, {
        ...input,
        ...(date !== undefined && { date }),
        ...(status !== undefined && { status }),
    });
    if (!updated) {
        throw new NotFoundError('Task not found', 'Task', id);
    }

    taskLogger.info({ taskId: id, status: updated.status }, 'Task updated');
    res.json(await getTaskKysely(req.db, id));
}));

router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);

    if (!(await deleteTaskKysely(req.db, id))) {
        throw new NotFoundError('Task not found', 'Task', id);
    }

    taskLogger.info({ taskId: id }, 'Task deleted');
    res.json({ success: true });
}));

export default router;
