/**
 * Customer queries against an in-memory SQLite database
 */

import type { KyselyDB } from '../../index.js';
import {
    createCustomerKysely,
    customerExistsKysely,
    deleteCustomerKysely,
    getCustomerKysely,
    listCustomersKysely,
    updateCustomerKysely,
} from '../customersKysely.js';
import { getOrderKysely } from '../ordersKysely.js';
import { getTaskKysely } from '../tasksKysely.js';
import { createTestDatabase, insertCustomer, insertOrder, insertTask } from '../../../__tests__/testDb.js';

let db: KyselyDB;

beforeEach(async () => {
    db = await createTestDatabase();
});

afterEach(async () => {
    await db.destroy();
});

describe('listCustomersKysely', () => {
    it('lists newest first, ties by id descending', async () => {
        const a = await insertCustomer(db, { name: 'A', createdAt: '2024-01-05' });
        const b = await insertCustomer(db, { name: 'B', createdAt: '2024-02-01' });
        const c = await insertCustomer(db, { name: 'C', createdAt: '2024-01-05' });

        const rows = await listCustomersKysely(db);
        expect(rows.map((r) => r.id)).toEqual([b.id, c.id, a.id]);
    });

    it('sorts ascending on request', async () => {
        const a = await insertCustomer(db, { createdAt: '2024-01-05' });
        const b = await insertCustomer(db, { createdAt: '2024-01-01' });

        const rows = await listCustomersKysely(db, { sort: 'asc' });
        expect(rows.map((r) => r.id)).toEqual([b.id, a.id]);
    });

    it('filters by inclusive created-date range', async () => {
        await insertCustomer(db, { name: 'Dec', createdAt: '2023-12-31' });
        await insertCustomer(db, { name: 'Jan 1', createdAt: '2024-01-01' });
        await insertCustomer(db, { name: 'Jan 31', createdAt: '2024-01-31' });
        await insertCustomer(db, { name: 'Feb', createdAt: '2024-02-01' });

        const rows = await listCustomersKysely(db, { startDate: '2024-01-01', endDate: '2024-01-31', sort: 'asc' });
        expect(rows.map((r) => r.name)).toEqual(['Jan 1', 'Jan 31']);
    });

    it('returns nothing when start is after end', async () => {
        await insertCustomer(db, { createdAt: '2024-01-15' });

        expect(await listCustomersKysely(db, { startDate: '2024-02-01', endDate: '2024-01-01' })).toEqual([]);
    });

    it('searches name, email and phone case-insensitively', async () => {
        await insertCustomer(db, { name: 'Ann Lee' });
        await insertCustomer(db, { name: 'Bob', email: 'ANNIE@example.com' });
        await insertCustomer(db, { name: 'Cy', phone: '555-0199' });
        await insertCustomer(db, { name: 'Dee' });

        const byName = await listCustomersKysely(db, { search: 'ann', sort: 'asc' });
        expect(byName.map((r) => r.name)).toEqual(['Ann Lee', 'Bob']);

        const byPhone = await listCustomersKysely(db, { search: '0199' });
        expect(byPhone.map((r) => r.name)).toEqual(['Cy']);
    });

    it('matches LIKE wildcards literally', async () => {
        await insertCustomer(db, { name: '100% Cotton Co' });
        await insertCustomer(db, { name: '1000 Threads' });

        const rows = await listCustomersKysely(db, { search: '100%' });
        expect(rows.map((r) => r.name)).toEqual(['100% Cotton Co']);
    });

    it('applies a limit', async () => {
        for (let i = 1; i <= 3; i++) {
            await insertCustomer(db, { createdAt: `2024-01-0${i}` });
        }
        expect(await listCustomersKysely(db, { limit: 2 })).toHaveLength(2);
    });
});

describe('customer writes', () => {
    it('creates and reads back every field', async () => {
        const created = await createCustomerKysely(db, {
            createdAt: '2024-03-01',
            name: 'Ann Lee',
            email: 'ann@example.com',
            phone: '555-0100',
            city: 'Springfield',
            country: 'US',
            externalCustomerId: 'cust-42',
            note: 'Prefers email',
        });

        expect(await getCustomerKysely(db, created.id)).toEqual({
            id: created.id,
            createdAt: '2024-03-01',
            name: 'Ann Lee',
            email: 'ann@example.com',
            phone: '555-0100',
            city: 'Springfield',
            country: 'US',
            externalCustomerId: 'cust-42',
            note: 'Prefers email',
        });
        expect(await customerExistsKysely(db, created.id)).toBe(true);
    });

    it('updates and reports missing rows', async () => {
        const customer = await insertCustomer(db, { name: 'Old' });

        const updated = await updateCustomerKysely(db, customer.id, { name: 'New' });
        expect(updated?.name).toBe('New');

        expect(await updateCustomerKysely(db, 9999, { name: 'Nobody' })).toBeUndefined();
    });

    it('deletes and reports missing rows', async () => {
        const customer = await insertCustomer(db);

        expect(await deleteCustomerKysely(db, customer.id)).toBe(true);
        expect(await deleteCustomerKysely(db, customer.id)).toBe(false);
        expect(await customerExistsKysely(db, customer.id)).toBe(false);
    });

    it('keeps orders and tasks of a deleted customer with a null reference', async () => {
        const customer = await insertCustomer(db, { name: 'Ann' });
        const order = await insertOrder(db, { customerId: customer.id });
        const task = await insertTask(db, { customerId: customer.id });

        await deleteCustomerKysely(db, customer.id);

        const orphanOrder = await getOrderKysely(db, order.id);
        expect(orphanOrder?.customerId).toBeNull();
        expect(orphanOrder?.customerName).toBeNull();

        const orphanTask = await getTaskKysely(db, task.id);
        expect(orphanTask?.customerId).toBeNull();
        expect(orphanTask?.customerName).toBeNull();
    });
});
