/**
 * Kysely Operator Queries
 *
 * The single operator account. Usernames are stored trimmed and lower-cased
 * by the caller.
 */

import type { KyselyDB } from '../index.js';
import type { NewOperator, OperatorRow } from '../types.js';

export async function countOperatorsKysely(db: KyselyDB): Promise<number> {
    const row = await db
        .selectFrom('Operator')
        .select((eb) => eb.fn.countAll<number>().as('count'))
        .executeTakeFirstOrThrow();
    return Number(row.count);
}

export async function findOperatorByUsernameKysely(
    db: KyselyDB,
    username: string
): Promise<OperatorRow | undefined> {
    return db
        .selectFrom('Operator')
        .selectAll()
        .where('username', '=', username)
        .executeTakeFirst();
}

export async function findOperatorByIdKysely(db: KyselyDB, id: number): Promise<OperatorRow | undefined> {
    return db
        .selectFrom('Operator')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();
}

/**
 * Insert the operator only while the table is empty. The emptiness check and
 * the insert are one statement, so concurrent registrations cannot both land.
 * Resolves to undefined when an operator already exists.
 */
export async function createFirstOperatorKysely(
    db: KyselyDB,
    values: NewOperator
): Promise<OperatorRow | undefined> {
    return db
        .insertInto('Operator')
        .columns(['username', 'passwordHash', 'createdAt'])
        .expression(
            db
                .selectNoFrom((eb) => [
                    eb.val(values.username).as('username'),
                    eb.val(values.passwordHash).as('passwordHash'),
                    eb.val(values.createdAt).as('createdAt'),
                ])
                .where((eb) => eb.not(eb.exists(eb.selectFrom('Operator').select('Operator.id'))))
        )
        .returningAll()
        .executeTakeFirst();
}

/**
 * Store a new hash and bump tokenVersion so earlier tokens fail validation
 */
export async function updateOperatorPasswordKysely(
    db: KyselyDB,
    id: number,
    passwordHash: string
): Promise<OperatorRow | undefined> {
    return db
        .updateTable('Operator')
        .set((eb) => ({
            passwordHash,
            tokenVersion: eb('tokenVersion', '+', 1),
        }))
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();
}
