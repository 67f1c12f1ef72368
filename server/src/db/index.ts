/**
 * SQLite database with Kysely
 *
 * This module exports:
 * - `createDatabase`: opens the SQLite file and wraps it in a Kysely instance
 * - `KyselyDB`: type helper for functions that take the database
 *
 * Usage:
 *   import { createDatabase } from './db/index.js';
 *
 *   const db = createDatabase(env.DATABASE_PATH);
 *   const orders = await db
 *     .selectFrom('Order')
 *     .select(['id', 'orderNumber'])
 *     .where('paymentStatus', '=', 'Pending')
 *     .execute();
 *
 * Queries take the instance as their first argument, so tests can pass an
 * in-memory database.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { DB } from './types.js';
import { dbLogger } from '../utils/logger.js';
import { DatabaseError } from '../utils/errors.js';

export const IN_MEMORY_DATABASE = ':memory:';

export type KyselyDB = Kysely<DB>;

/**
 * Open the database file (creating its directory when needed).
 * Foreign keys are enforced so customer deletion can null references.
 */
export function createDatabase(databasePath: string): KyselyDB {
    let sqlite: Database.Database;
    try {
        if (databasePath !== IN_MEMORY_DATABASE) {
            fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
        }
        sqlite = new Database(databasePath);
    } catch (error: unknown) {
        throw new DatabaseError(
            `Cannot open database at ${databasePath}`,
            error instanceof Error ? error : null
        );
    }
    sqlite.pragma('foreign_keys = ON');
    if (databasePath !== IN_MEMORY_DATABASE) {
        sqlite.pragma('journal_mode = WAL');
    }

    dbLogger.debug({ databasePath }, 'Opened SQLite database');

    return new Kysely<DB>({
        dialect: new SqliteDialect({ database: sqlite }),
    });
}

// Re-export table types for convenience
export type { DB } from './types.js';
