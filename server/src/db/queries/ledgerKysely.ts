/**
 * Kysely Ledger Queries
 *
 * Expense and income entries. `type` filters to one side; omit it for both.
 */

import type { DateRange, EntryType, LedgerEntry } from '@storekeep/shared';
import type { KyselyDB } from '../index.js';
import type { LedgerEntryUpdate, NewLedgerEntry } from '../types.js';
import type { DateSortDirection } from './sqlHelpers.js';

export interface LedgerListParams extends DateRange {
    type?: EntryType;
    sort?: DateSortDirection;
}

export async function listLedgerEntriesKysely(
    db: KyselyDB,
    params: LedgerListParams = {}
): Promise<LedgerEntry[]> {
    const { type, startDate, endDate, sort = 'desc' } = params;

    let query = db.selectFrom('LedgerEntry').selectAll();

    if (type !== undefined) {
        query = query.where('LedgerEntry.type', '=', type);
    }
    if (startDate !== undefined) {
        query = query.where('LedgerEntry.date', '>=', startDate);
    }
    if (endDate !== undefined) {
        query = query.where('LedgerEntry.date', '<=', endDate);
    }

    return query
        .orderBy('LedgerEntry.date', sort)
        .orderBy('LedgerEntry.id', sort)
        .execute();
}

export async function getLedgerEntryKysely(db: KyselyDB, id: number): Promise<LedgerEntry | undefined> {
    return db
        .selectFrom('LedgerEntry')
        .selectAll()
        .where('LedgerEntry.id', '=', id)
        .executeTakeFirst();
}

export async function createLedgerEntryKysely(db: KyselyDB, values: NewLedgerEntry): Promise<LedgerEntry> {
    return db
        .insertInto('LedgerEntry')
        .values(values)
        .returningAll()
        .executeTakeFirstOrThrow();
}

export async function updateLedgerEntryKysely(
    db: KyselyDB,
    id: number,
    changes: LedgerEntryUpdate
): Promise<LedgerEntry | undefined> {
    return db
        .updateTable('LedgerEntry')
        .set(changes)
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();
}

export async function deleteLedgerEntryKysely(db: KyselyDB, id: number): Promise<boolean> {
    const result = await db
        .deleteFrom('LedgerEntry')
        .where('id', '=', id)
        .executeTakeFirst();
    return result.numDeletedRows > 0n;
}
