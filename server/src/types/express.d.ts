// src/types/express.d.ts
import type { KyselyDB } from '../db/index.js';
import type { AuthenticatedUser } from '../utils/authCore.js';

declare global {
    namespace Express {
        interface Request {
            db: KyselyDB;
            user?: AuthenticatedUser;
        }
    }
}

export {};
