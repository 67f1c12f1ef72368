/**
 * Domain Constants
 *
 * Enumerations and defaults shared by schemas, queries and exports.
 * Values are stored verbatim in the database, so changing one here
 * means existing rows stop matching filters.
 */

/** Payment state of an order */
export const PAYMENT_STATUSES = ['Pending', 'Paid', 'Refunded'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

/** Fulfillment state of an order */
export const FULFILLMENT_STATUSES = ['Unfulfilled', 'Partial', 'Fulfilled', 'Cancelled'] as const;
export type FulfillmentStatus = (typeof FULFILLMENT_STATUSES)[number];

/** Ledger entry direction; the amount is always stored positive */
export const ENTRY_TYPES = ['expense', 'income'] as const;
export type EntryType = (typeof ENTRY_TYPES)[number];

export const TASK_STATUSES = ['Pending', 'In Progress', 'Done'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ['Low', 'Medium', 'High'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

/** Sentinel accepted by list and export filters meaning "no filter" */
export const FILTER_ALL = 'all' as const;

export const RECORD_DEFAULTS = {
    currency: 'USD',
    category: 'General',
    entryType: 'expense',
    taskStatus: 'Pending',
} as const satisfies {
    currency: string;
    category: string;
    entryType: EntryType;
    taskStatus: TaskStatus;
};

/** Sections that can be exported, in navigation order */
export const EXPORT_SECTIONS = ['customers', 'orders', 'expenses', 'tasks'] as const;
export type ExportSection = (typeof EXPORT_SECTIONS)[number];

/** Number of rows shown in each "recent" list on the dashboard */
export const DASHBOARD_RECENT_LIMIT = 5;

/** Accepted values for the ledger `filter_type` query parameter */
export const ENTRY_TYPE_FILTERS = [FILTER_ALL, ...ENTRY_TYPES] as const;
export type EntryTypeFilter = (typeof ENTRY_TYPE_FILTERS)[number];

/** Accepted values for the task `status_filter` query parameter */
export const TASK_STATUS_FILTERS = [FILTER_ALL, ...TASK_STATUSES] as const;
export type TaskStatusFilter = (typeof TASK_STATUS_FILTERS)[number];
