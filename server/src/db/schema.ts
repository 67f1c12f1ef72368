/**
 * Table bootstrap
 *
 * Creates every table and index when missing. There are no migrations:
 * the schema is small and additive changes go here with IF NOT EXISTS.
 */

import { sql } from 'kysely';
import { ENTRY_TYPES, TASK_STATUSES } from '@storekeep/shared';
import type { KyselyDB } from './index.js';
import { dbLogger } from '../utils/logger.js';

function sqlList(values: readonly string[]) {
    return sql.join(values.map((value) => sql.lit(value)));
}

export async function ensureSchema(db: KyselyDB): Promise<void> {
    await db.schema
        .createTable('Operator')
        .ifNotExists()
        .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
        .addColumn('username', 'text', (col) => col.notNull().unique())
        .addColumn('passwordHash', 'text', (col) => col.notNull())
        .addColumn('tokenVersion', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('createdAt', 'text', (col) => col.notNull())
        .execute();

    await db.schema
        .createTable('Customer')
        .ifNotExists()
        .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
        .addColumn('createdAt', 'text', (col) => col.notNull())
        .addColumn('name', 'text', (col) => col.notNull())
        .addColumn('email', 'text')
        .addColumn('phone', 'text')
        .addColumn('city', 'text')
        .addColumn('country', 'text')
        .addColumn('externalCustomerId', 'text')
        .addColumn('note', 'text')
        .execute();

    // Deleting a customer keeps its orders and tasks with a null reference
    await db.schema
        .createTable('Order')
        .ifNotExists()
        .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
        .addColumn('customerId', 'integer', (col) => col.references('Customer.id').onDelete('set null'))
        .addColumn('orderDate', 'text', (col) => col.notNull())
        .addColumn('orderNumber', 'text', (col) => col.notNull())
        .addColumn('totalAmount', 'real', (col) => col.notNull())
        .addColumn('currency', 'text', (col) => col.notNull().defaultTo('USD'))
        .addColumn('paymentStatus', 'text')
        .addColumn('fulfillmentStatus', 'text')
        .addColumn('salesChannel', 'text')
        .addColumn('note', 'text')
        .addCheckConstraint('Order_totalAmount_nonnegative', sql`"totalAmount" >= 0`)
        .execute();

    await db.schema
        .createTable('LedgerEntry')
        .ifNotExists()
        .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
        .addColumn('date', 'text', (col) => col.notNull())
        .addColumn('type', 'text', (col) => col.notNull().defaultTo('expense'))
        .addColumn('category', 'text', (col) => col.notNull())
        .addColumn('description', 'text')
        .addColumn('amount', 'real', (col) => col.notNull())
        .addCheckConstraint('LedgerEntry_amount_nonnegative', sql`"amount" >= 0`)
        .addCheckConstraint('LedgerEntry_type_valid', sql`"type" in (${sqlList(ENTRY_TYPES)})`)
        .execute();

    await db.schema
        .createTable('Task')
        .ifNotExists()
        .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
        .addColumn('customerId', 'integer', (col) => col.references('Customer.id').onDelete('set null'))
        .addColumn('date', 'text', (col) => col.notNull())
        .addColumn('title', 'text', (col) => col.notNull())
        .addColumn('status', 'text', (col) => col.notNull().defaultTo('Pending'))
        .addColumn('priority', 'text')
        .addColumn('note', 'text')
        .addCheckConstraint('Task_status_valid', sql`"status" in (${sqlList(TASK_STATUSES)})`)
        .execute();

    // Range filters and exports scan by date
    await db.schema.createIndex('Customer_createdAt_idx').ifNotExists().on('Customer').column('createdAt').execute();
    await db.schema.createIndex('Order_orderDate_idx').ifNotExists().on('Order').column('orderDate').execute();
    await db.schema.createIndex('Order_customerId_idx').ifNotExists().on('Order').column('customerId').execute();
    await db.schema.createIndex('LedgerEntry_date_idx').ifNotExists().on('LedgerEntry').column('date').execute();
    await db.schema.createIndex('Task_date_idx').ifNotExists().on('Task').column('date').execute();
    await db.schema.createIndex('Task_customerId_idx').ifNotExists().on('Task').column('customerId').execute();

    dbLogger.debug('Schema ready');
}
