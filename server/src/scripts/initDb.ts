/**
 * Create the database file and its tables, then exit.
 *
 * Run: npm run db:init
 */

import { env } from '../config/env.js';
import { createDatabase } from '../db/index.js';
import { ensureSchema } from '../db/schema.js';
import { dbLogger } from '../utils/logger.js';

async function initDb(): Promise<void> {
    const db = createDatabase(env.DATABASE_PATH);
    try {
        await ensureSchema(db);
        dbLogger.info({ databasePath: env.DATABASE_PATH }, 'Database initialized');
    } finally {
        await db.destroy();
    }
}

initDb().catch((error: unknown) => {
    dbLogger.fatal({ err: error }, 'Database initialization failed');
    process.exit(1);
});
