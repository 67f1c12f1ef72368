/**
 * Kysely Tasks Queries
 *
 * Follow-up tasks, optionally tied to a customer (display name joined in).
 */

import type { DateRange, Task, TaskStatus, TaskWithCustomer } from '@storekeep/shared';
import type { KyselyDB } from '../index.js';
import type { NewTask, TaskUpdate } from '../types.js';
import { containsInsensitive, type DateSortDirection } from './sqlHelpers.js';

export interface TasksListParams extends DateRange {
    status?: TaskStatus;
    /** Matches title and note */
    search?: string;
    sort?: DateSortDirection;
    limit?: number;
}

function selectTasksWithCustomer(db: KyselyDB) {
    return db
        .selectFrom('Task')
        .leftJoin('Customer', 'Customer.id', 'Task.customerId')
        .selectAll('Task')
        .select('Customer.name as customerName');
}

export async function listTasksKysely(
    db: KyselyDB,
    params: TasksListParams = {}
): Promise<TaskWithCustomer[]> {
    const { status, search, startDate, endDate, sort = 'desc', limit } = params;

    let query = selectTasksWithCustomer(db);

    if (status !== undefined) {
        query = query.where('Task.status', '=', status);
    }
    if (search) {
        query = query.where((eb) =>
            eb.or([
                containsInsensitive('Task.title', search),
                containsInsensitive('Task.note', search),
            ])
        );
    }
    if (startDate !== undefined) {
        query = query.where('Task.date', '>=', startDate);
    }
    if (endDate !== undefined) {
        query = query.where('Task.date', '<=', endDate);
    }

    query = query.orderBy('Task.date', sort).orderBy('Task.id', sort);

    if (limit !== undefined) {
        query = query.limit(limit);
    }

    return query.execute();
}

export async function getTaskKysely(db: KyselyDB, id: number): Promise<TaskWithCustomer | undefined> {
    return selectTasksWithCustomer(db)
        .where('Task.id', '=', id)
        .executeTakeFirst();
}

export async function createTaskKysely(db: KyselyDB, values: NewTask): Promise<Task> {
    return db
        .insertInto('Task')
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow();
}

export async function updateTaskKysely(
    db: KyselyDB,
    id: number,
    changes: TaskUpdate
): Promise<Task | undefined> {
    return db
        .updateTable('Task')
        .set(changes)
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();
}

export async function deleteTaskKysely(db: KyselyDB, id: number): Promise<boolean> {
    const result = await db
        .deleteFrom('Task')
        .where('id', '=', id)
        .executeTakeFirst();
    return result.numDeletedRows > 0n;
}
