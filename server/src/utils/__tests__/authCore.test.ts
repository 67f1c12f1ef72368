import jwt from 'jsonwebtoken';
import type { KyselyDB } from '../../db/index.js';
import { updateOperatorPasswordKysely } from '../../db/queries/index.js';
import { createTestDatabase, insertOperator } from '../../__tests__/testDb.js';
import {
    hashPassword,
    signToken,
    validateAuth,
    validateTokenVersion,
    verifyPassword,
    verifyToken,
} from '../authCore.js';

const SECRET = 'test-secret';

describe('passwords', () => {
    it('verifies against a bcrypt hash', async () => {
        const hash = await hashPassword('counter42');

        expect(hash).not.toBe('counter42');
        expect(await verifyPassword('counter42', hash)).toBe(true);
        expect(await verifyPassword('counter43', hash)).toBe(false);
    });
});

describe('tokens', () => {
    const operator = { id: 1, username: 'owner', tokenVersion: 3 };

    it('round-trips the operator claims', () => {
        const payload = verifyToken(signToken(operator, SECRET, '1h'), SECRET);
        expect(payload).toMatchObject({ id: 1, username: 'owner', tokenVersion: 3 });
    });

    it('rejects a token signed with another secret', () => {
        expect(verifyToken(signToken(operator, 'other-secret', '1h'), SECRET)).toBeNull();
    });

    it('rejects a token with the wrong payload shape', () => {
        const token = jwt.sign({ id: 'abc', email: 'owner@example.com' }, SECRET);
        expect(verifyToken(token, SECRET)).toBeNull();
    });

    it('rejects an expired token', () => {
        const token = jwt.sign({ ...operator, exp: Math.floor(Date.now() / 1000) - 60 }, SECRET);
        expect(verifyToken(token, SECRET)).toBeNull();
    });

    it('rejects garbage', () => {
        expect(verifyToken('not-a-token', SECRET)).toBeNull();
    });
});

describe('validateAuth', () => {
    let db: KyselyDB;

    beforeEach(async () => {
        db = await createTestDatabase();
    });

    afterEach(async () => {
        await db.destroy();
    });

    it('accepts a current token', async () => {
        const operator = await insertOperator(db);
        const result = await validateAuth(signToken(operator, SECRET, '1h'), db, SECRET);

        expect(result).toEqual({
            success: true,
            user: { id: operator.id, username: 'owner', tokenVersion: 0 },
        });
    });

    it('reports a missing token', async () => {
        expect(await validateAuth(undefined, db, SECRET)).toMatchObject({ success: false, code: 'NO_TOKEN' });
    });

    it('reports an invalid token', async () => {
        expect(await validateAuth('nope', db, SECRET)).toMatchObject({ success: false, code: 'INVALID_TOKEN' });
    });

    it('invalidates tokens issued before a password change', async () => {
        const operator = await insertOperator(db);
        const token = signToken(operator, SECRET, '1h');

        await updateOperatorPasswordKysely(db, operator.id, 'h2');

        expect(await validateTokenVersion(db, operator.id, 0)).toBe(false);
        expect(await validateTokenVersion(db, operator.id, 1)).toBe(true);
        expect(await validateAuth(token, db, SECRET)).toMatchObject({ success: false, code: 'SESSION_INVALIDATED' });
    });

    it('rejects tokens for an operator that does not exist', async () => {
        const token = signToken({ id: 42, username: 'ghost', tokenVersion: 0 }, SECRET, '1h');
        expect(await validateAuth(token, db, SECRET)).toMatchObject({ success: false, code: 'SESSION_INVALIDATED' });
    });
});
