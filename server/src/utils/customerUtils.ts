/**
 * Customer reference helpers
 *
 * Orders and tasks may point at a customer. The reference is optional,
 * but when given it must name an existing row.
 */

import type { KyselyDB } from '../db/index.js';
import { customerExistsKysely } from '../db/queries/index.js';
import { ValidationError } from './errors.js';

/**
 * @throws ValidationError when customerId is set and no such customer exists
 */
export async function assertCustomerRef(db: KyselyDB, customerId: number | null): Promise<void> {
    if (customerId === null) return;

    if (!(await customerExistsKysely(db, customerId))) {
        throw new ValidationError(`Customer ${customerId} does not exist`, [
            { path: 'customerId', message: 'Customer does not exist' },
        ]);
    }
}
