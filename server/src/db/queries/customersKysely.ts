/**
 * Kysely Customers Queries
 *
 * List (search + created-date range), lookup and writes for the Customer table.
 * Deleting a customer leaves its orders and tasks in place; the foreign keys
 * null their customerId.
 */

import type { Customer, DateRange } from '@storekeep/shared';
import type { KyselyDB } from '../index.js';
import type { CustomerUpdate, NewCustomer } from '../types.js';
import { containsInsensitive, type DateSortDirection } from './sqlHelpers.js';

// ============================================
// INPUT TYPES
// ============================================

export interface CustomersListParams extends DateRange {
    /** Matches name, email and phone */
    search?: string;
    sort?: DateSortDirection;
    limit?: number;
}

// ============================================
// LIST QUERY
// ============================================

/**
 * List customers filtered by search and inclusive created-date range
 */
export async function listCustomersKysely(
    db: KyselyDB,
    params: CustomersListParams = {}
): Promise<Customer[]> {
    const { search, startDate, endDate, sort = 'desc', limit } = params;

    let query = db.selectFrom('Customer').selectAll('Customer');

    if (search) {
        query = query.where((eb) =>
            eb.or([
                containsInsensitive('Customer.name', search),
                containsInsensitive('Customer.email', search),
                containsInsensitive('Customer.phone', search),
            ])
        );
    }

    if (startDate !== undefined) {
        query = query.where('Customer.createdAt', '>=', startDate);
    }
    if (endDate !== undefined) {
        query = query.where('Customer.createdAt', '<=', endDate);
    }

    query = query.orderBy('Customer.createdAt', sort).orderBy('Customer.id', sort);

    if (limit !== undefined) {
        query = query.limit(limit);
    }

    return query.execute();
}

// ============================================
// SINGLE RECORD
// ============================================

export async function getCustomerKysely(db: KyselyDB, id: number): Promise<Customer | undefined> {
    return db
        .selectFrom('Customer')
        .selectAll()
        .where('Customer.id', '=', id)
        .executeTakeFirst();
}

export async function customerExistsKysely(db: KyselyDB, id: number): Promise<boolean> {
    const row = await db
        .selectFrom('Customer')
        .select('Customer.id')
        .where('Customer.id', '=', id)
        .executeTakeFirst();
    return row !== undefined;
}

// ============================================
// WRITES
// ============================================

export async function createCustomerKysely(db: KyselyDB, values: NewCustomer): Promise<Customer> {
    return db
        .insertInto('Customer')
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow();
}

/**
 * @returns the updated row, or undefined when no customer has this id
 */
export async function updateCustomerKysely(
    db: KyselyDB,
    id: number,
    changes: CustomerUpdate
): Promise<Customer | undefined> {
    return db
        .updateTable('Customer')
        .set(changes)
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();
}

/**
 * @returns false when no customer has this id
 */
export async function deleteCustomerKysely(db: KyselyDB, id: number): Promise<boolean> {
    const result = await db
        .deleteFrom('Customer')
        .where('id', '=', id)
        .executeTakeFirst();
    return result.numDeletedRows > 0n;
}
