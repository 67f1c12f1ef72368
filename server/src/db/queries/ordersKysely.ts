/**
 * Kysely Orders Queries
 *
 * Orders are joined to Customer for the display-only customer name.
 * A null or dangling customerId yields customerName = null.
 */

import type { DateRange, Order, OrderWithCustomer } from '@storekeep/shared';
import type { KyselyDB } from '../index.js';
import type { NewOrder, OrderUpdate } from '../types.js';
import { containsInsensitive, type DateSortDirection } from './sqlHelpers.js';

export interface OrdersListParams extends DateRange {
    /** Matches order number, sales channel and payment status */
    search?: string;
    sort?: DateSortDirection;
    limit?: number;
}

function selectOrdersWithCustomer(db: KyselyDB) {
    return db
        .selectFrom('Order')
        .leftJoin('Customer', 'Customer.id', 'Order.customerId')
        .selectAll('Order')
        .select('Customer.name as customerName');
}

// ============================================
// LIST QUERY
// ============================================

/**
 * List orders filtered by search and inclusive order-date range
 */
export async function listOrdersKysely(
    db: KyselyDB,
    params: OrdersListParams = {}
): Promise<OrderWithCustomer[]> {
    const { search, startDate, endDate, sort = 'desc', limit } = params;

    let query = selectOrdersWithCustomer(db);

    if (search) {
        query = query.where((eb) =>
            eb.or([
                containsInsensitive('Order.orderNumber', search),
                containsInsensitive('Order.salesChannel', search),
                containsInsensitive('Order.paymentStatus', search),
            ])
        );
    }

    if (startDate !== undefined) {
        query = query.where('Order.orderDate', '>=', startDate);
    }
    if (endDate !== undefined) {
        query = query.where('Order.orderDate', '<=', endDate);
    }

    query = query.orderBy('Order.orderDate', sort).orderBy('Order.id', sort);

    if (limit !== undefined) {
        query = query.limit(limit);
    }

    return query.execute();
}

/**
 * Sum of totalAmount across a list, as shown under the orders table
 */
export function sumOrderTotals(orders: readonly Pick<Order, 'totalAmount'>[]): number {
    return orders.reduce((sum, order) => sum + order.totalAmount, 0);
}

// ============================================
// SINGLE RECORD
// ============================================

export async function getOrderKysely(db: KyselyDB, id: number): Promise<OrderWithCustomer | undefined> {
    return selectOrdersWithCustomer(db)
        .where('Order.id', '=', id)
        .executeTakeFirst();
}

// ============================================
// WRITES
// ============================================

export async function createOrderKysely(db: KyselyDB, values: NewOrder): Promise<Order> {
    return db
        .insertInto('Order')
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow();
}

export async function updateOrderKysely(
    db: KyselyDB,
    id: number,
    changes: OrderUpdate
): Promise<Order | undefined> {
    return db
        .updateTable('Order')
        .set(changes)
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();
}

export async function deleteOrderKysely(db: KyselyDB, id: number): Promise<boolean> {
    const result = await db
        .deleteFrom('Order')
        .where('id', '=', id)
        .executeTakeFirst();
    return result.numDeletedRows > 0n;
}
