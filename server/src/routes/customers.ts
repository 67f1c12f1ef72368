/**
 * @module routes/customers
 * @description Customer records
 *
 * Listing is newest first and filters by search (name, email, phone) and
 * created-date range. Deleting a customer keeps its orders and tasks; their
 * customer reference becomes null.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    customerInputSchema,
    customersListQuerySchema,
    idParamSchema,
    todayDateString,
    type CustomersListResponse,
} from '@storekeep/shared';
import { authenticateToken } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import {
    createCustomerKysely,
    deleteCustomerKysely,
    getCustomerKysely,
    listCustomersKysely,
    updateCustomerKysely,
} from '../db/queries/index.js';
import { NotFoundError } from '../utils/errors.js';
import { parseInput } from '../utils/validation.js';
import { customerLogger } from '../utils/logger.js';

const router: Router = Router();

router.use(authenticateToken);

router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const query = parseInput(customersListQuerySchema, req.query);

    const customers = await listCustomersKysely(req.db, {
        search: query.search,
        startDate: query.start_date,
        endDate: query.end_date,
    });

    const body: CustomersListResponse = { customers };
    res.json(body);
}));

router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);

    const customer = await getCustomerKysely(req.db, id);
    if (!customer) {
        throw new NotFoundError('Customer not found', 'Customer', id);
    }

    res.json(customer);
}));

router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const { createdAt, ...input } = parseInput(customerInputSchema, req.body);

    const customer = await createCustomerKysely(req.db, {
        ...input,
        createdAt: createdAt ?? todayDateString(),
    });

    customerLogger.info({ customerId: customer.id }, 'Customer created');
    res.status(201).json(customer);
}));

router.put('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);
    const { createdAt, ...input } = parseInput(customerInputSchema, req.body);

    // An omitted createdAt keeps the stored date
    const customer = await updateCustomerKysely(req.db, id, {
        ...input,
        ...(createdAt !== undefined && { createdAt }),
    });
    if (!customer) {
        throw new NotFoundError('Customer not found', 'Customer', id);
    }

    customerLogger.info({ customerId: id }, 'Customer updated');
    res.json(customer);
}));

router.delete('/:id', asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseInput(idParamSchema, req.params);

    if (!(await deleteCustomerKysely(req.db, id))) {
        throw new NotFoundError('Customer not found', 'Customer', id);
    }

    customerLogger.info({ customerId: id }, 'Customer deleted');
    res.json({ success: true });
}));

export default router;
