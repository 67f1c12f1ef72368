/**
 * Kysely table definitions
 *
 * One interface per SQLite table. Calendar dates are TEXT (YYYY-MM-DD);
 * enum columns are TEXT narrowed to the shared unions, which the write
 * paths guarantee through zod validation. Columns with a database default
 * are Generated, so inserts may omit them.
 */

import type { Generated, Insertable, Selectable, Updateable } from 'kysely';
import type {
    EntryType,
    FulfillmentStatus,
    PaymentStatus,
    TaskPriority,
    TaskStatus,
} from '@storekeep/shared';

export interface OperatorTable {
    id: Generated<number>;
    username: string;
    passwordHash: string;
    /** Bumped on password change to invalidate outstanding tokens */
    tokenVersion: Generated<number>;
    createdAt: string;
}

export interface CustomerTable {
    id: Generated<number>;
    createdAt: string;
    name: string;
    email: string | null;
    phone: string | null;
    city: string | null;
    country: string | null;
    externalCustomerId: string | null;
    note: string | null;
}

export interface OrderTable {
    id: Generated<number>;
    customerId: number | null;
    orderDate: string;
    orderNumber: string;
    totalAmount: number;
    currency: Generated<string>;
    paymentStatus: PaymentStatus | null;
    fulfillmentStatus: FulfillmentStatus | null;
    salesChannel: string | null;
    note: string | null;
}

export interface LedgerEntryTable {
    id: Generated<number>;
    date: string;
    type: Generated<EntryType>;
    category: string;
    description: string | null;
    amount: number;
}

export interface TaskTable {
    id: Generated<number>;
    customerId: number | null;
    date: string;
    title: string;
    status: Generated<TaskStatus>;
    priority: TaskPriority | null;
    note: string | null;
}

export interface DB {
    Operator: OperatorTable;
    Customer: CustomerTable;
    Order: OrderTable;
    LedgerEntry: LedgerEntryTable;
    Task: TaskTable;
}

export type OperatorRow = Selectable<OperatorTable>;
export type NewOperator = Insertable<OperatorTable>;
export type NewCustomer = Insertable<CustomerTable>;
export type CustomerUpdate = Updateable<CustomerTable>;
export type NewOrder = Insertable<OrderTable>;
export type OrderUpdate = Updateable<OrderTable>;
export type NewLedgerEntry = Insertable<LedgerEntryTable>;
export type LedgerEntryUpdate = Updateable<LedgerEntryTable>;
export type NewTask = Insertable<TaskTable>;
export type TaskUpdate = Updateable<TaskTable>;
