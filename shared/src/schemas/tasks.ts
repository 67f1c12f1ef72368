import { z } from 'zod';
import { FILTER_ALL, TASK_PRIORITIES, TASK_STATUS_FILTERS, TASK_STATUSES } from '../domain/constants.js';
import {
    customerRefSchema,
    dateRangeQuerySchema,
    emptyToNull,
    emptyToUndefined,
    optionalDateSchema,
    optionalText,
    requiredText,
    searchQuerySchema,
} from './common.js';

export const taskStatusSchema = z.enum(TASK_STATUSES, {
    errorMap: () => ({ message: `Status must be one of: ${TASK_STATUSES.join(', ')}` }),
});

export const taskPrioritySchema = z.enum(TASK_PRIORITIES, {
    errorMap: () => ({ message: `Priority must be one of: ${TASK_PRIORITIES.join(', ')}` }),
});

export const taskStatusFilterSchema = z.preprocess(
    emptyToUndefined,
    z.enum(TASK_STATUS_FILTERS, {
        errorMap: () => ({ message: `status_filter must be one of: ${TASK_STATUS_FILTERS.join(', ')}` }),
    }).default(FILTER_ALL)
);

export const taskInputSchema = z.object({
    date: optionalDateSchema,
    title: requiredText('Title', 200),
    customerId: customerRefSchema,
    /** Omitted: `Pending` on create, unchanged on update */
    status: z.preprocess(emptyToUndefined, taskStatusSchema.optional()),
    priority: z.preprocess(emptyToNull, taskPrioritySchema.nullable()),
    note: optionalText('Note', 500),
});

export type TaskInput = z.infer<typeof taskInputSchema>;

/** search matches title and note */
export const tasksListQuerySchema = dateRangeQuerySchema.extend({
    status_filter: taskStatusFilterSchema,
    search: searchQuerySchema,
});

export type TasksListQuery = z.infer<typeof tasksListQuerySchema>;

export const tasksExportQuerySchema = dateRangeQuerySchema.extend({
    status_filter: taskStatusFilterSchema,
});

export type TasksExportQuery = z.infer<typeof tasksExportQuerySchema>;
