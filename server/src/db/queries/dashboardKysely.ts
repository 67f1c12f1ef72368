/**
 * Kysely Dashboard Queries
 *
 * Aggregates for the landing page: all-time counts and ledger totals,
 * today's figures, and the most recent records of each kind.
 */

import { sql } from 'kysely';
import {
    DASHBOARD_RECENT_LIMIT,
    todayDateString,
    type DashboardStats,
    type DashboardSummary,
    type DashboardToday,
} from '@storekeep/shared';
import type { KyselyDB } from '../index.js';
import { listCustomersKysely } from './customersKysely.js';
import { listOrdersKysely } from './ordersKysely.js';
import { listTasksKysely } from './tasksKysely.js';

const sumIncome = sql<number>`COALESCE(SUM(CASE WHEN "type" = 'income' THEN "amount" ELSE 0 END), 0)`;
const sumExpense = sql<number>`COALESCE(SUM(CASE WHEN "type" = 'expense' THEN "amount" ELSE 0 END), 0)`;

async function getStatsKysely(db: KyselyDB): Promise<DashboardStats> {
    const [customers, orders, openTasks, ledger] = await Promise.all([
        db.selectFrom('Customer')
            .select((eb) => eb.fn.countAll<number>().as('count'))
            .executeTakeFirstOrThrow(),
        db.selectFrom('Order')
            .select((eb) => eb.fn.countAll<number>().as('count'))
            .executeTakeFirstOrThrow(),
        db.selectFrom('Task')
            .select((eb) => eb.fn.countAll<number>().as('count'))
            .where('status', '!=', 'Done')
            .executeTakeFirstOrThrow(),
        db.selectFrom('LedgerEntry')
            .select([sumIncome.as('income'), sumExpense.as('expense')])
            .executeTakeFirstOrThrow(),
    ]);

    const totalIncome = Number(ledger.income);
    const totalExpense = Number(ledger.expense);

    return {
        totalCustomers: Number(customers.count),
        totalOrders: Number(orders.count),
        openTasks: Number(openTasks.count),
        totalIncome,
        totalExpense,
        net: totalIncome - totalExpense,
    };
}

async function getTodayKysely(db: KyselyDB, date: string): Promise<DashboardToday> {
    const [orders, ledger] = await Promise.all([
        db.selectFrom('Order')
            .select((eb) => eb.fn.countAll<number>().as('count'))
            .where('orderDate', '=', date)
            .executeTakeFirstOrThrow(),
        db.selectFrom('LedgerEntry')
            .select([sumIncome.as('income'), sumExpense.as('expense')])
            .where('date', '=', date)
            .executeTakeFirstOrThrow(),
    ]);

    return {
        date,
        ordersToday: Number(orders.count),
        incomeToday: Number(ledger.income),
        expenseToday: Number(ledger.expense),
    };
}

export async function getDashboardSummaryKysely(
    db: KyselyDB,
    now: Date = new Date()
): Promise<DashboardSummary> {
    const limit = DASHBOARD_RECENT_LIMIT;
    const [stats, today, recentCustomers, recentOrders, recentTasks] = await Promise.all([
        getStatsKysely(db),
        getTodayKysely(db, todayDateString(now)),
        listCustomersKysely(db, { limit }),
        listOrdersKysely(db, { limit }),
        listTasksKysely(db, { limit }),
    ]);

    return { stats, today, recentCustomers, recentOrders, recentTasks };
}
