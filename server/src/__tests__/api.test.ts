/**
 * HTTP API tests: the Express app on a local port over an in-memory database
 */

import ExcelJS from 'exceljs';
import { z } from 'zod';
import type { KyselyDB } from '../db/index.js';
import { countOperatorsKysely } from '../db/queries/index.js';
import { createTestDatabase } from './testDb.js';
import { startTestServer, type TestServer } from './httpServer.js';

const USERNAME = 'owner';
const PASSWORD = 'counter42';
const XLSX_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

const loginResponseSchema = z.object({ token: z.string(), operator: z.object({ id: z.number(), username: z.string() }) });
const recordSchema = z.object({ id: z.number() }).passthrough();

let db: KyselyDB;
let server: TestServer;
let token: string;

interface RequestOptions {
    method?: string;
    body?: unknown;
    token?: string | null;
    cookie?: string;
}

function api(path: string, { method = 'GET', body, token: auth = token, cookie }: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (auth) headers['Authorization'] = `Bearer ${auth}`;
    if (cookie) headers['Cookie'] = cookie;

    return fetch(`${server.baseUrl}${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
    });
}

async function createRecord(path: string, body: unknown): Promise<number> {
    const res = await api(path, { method: 'POST', body });
    expect(res.status).toBe(201);
    return recordSchema.parse(await res.json()).id;
}

async function loadWorkbook(res: Response): Promise<ExcelJS.Workbook> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(await res.arrayBuffer());
    return workbook;
}

beforeEach(async () => {
    db = await createTestDatabase();
    server = await startTestServer(db);

    const register = await api('/api/auth/register', {
        method: 'POST',
        body: { username: USERNAME, password: PASSWORD, confirm: PASSWORD },
        token: null,
    });
    expect(register.status).toBe(201);

    const login = await api('/api/auth/login', {
        method: 'POST',
        body: { username: USERNAME, password: PASSWORD },
        token: null,
    });
    token = loginResponseSchema.parse(await login.json()).token;
});

afterEach(async () => {
    await server.close();
    await db.destroy();
});

describe('health and routing', () => {
    it('answers health checks without a token', async () => {
        const res = await api('/api/health', { token: null });
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'ok' });
    });

    it('returns 404 for unknown routes', async () => {
        const res = await api('/api/nowhere');
        expect(res.status).toBe(404);
        expect(await res.json()).toMatchObject({ type: 'NotFoundError' });
    });

    it('rejects malformed JSON bodies', async () => {
        const res = await fetch(`${server.baseUrl}/api/customers`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${token}` },
            body: '{"name":',
        });
        expect(res.status).toBe(400);
    });
});

describe('access gate', () => {
    it.each(['/api/customers', '/api/orders', '/api/expenses', '/api/tasks', '/api/export/orders', '/api/dashboard'])(
        'requires a token for %s',
        async (path) => {
            const res = await api(path, { token: null });
            expect(res.status).toBe(401);
        }
    );

    it('allows only one operator account', async () => {
        const res = await api('/api/auth/register', {
            method: 'POST',
            body: { username: 'second', password: PASSWORD, confirm: PASSWORD },
            token: null,
        });
        expect(res.status).toBe(409);
        expect(await res.json()).toMatchObject({ type: 'ConflictError', conflictType: 'operator_exists' });
    });

    it('creates a single operator when registrations race on a fresh database', async () => {
        const freshDb = await createTestDatabase();
        const fresh = await startTestServer(freshDb);
        try {
            const statuses = await Promise.all(
                ['alice', 'bob', 'carol'].map(async (username) => {
                    const res = await fetch(`${fresh.baseUrl}/api/auth/register`, {
                        method: 'POST',
                        headers: { 'Content-Type': 'application/json' },
                        body: JSON.stringify({ username, password: PASSWORD, confirm: PASSWORD }),
                    });
                    return res.status;
                })
            );

            expect([...statuses].sort()).toEqual([201, 409, 409]);
            expect(await countOperatorsKysely(freshDb)).toBe(1);
        } finally {
            await fresh.close();
            await freshDb.destroy();
        }
    });

    it('gives one generic message for a wrong password or unknown user', async () => {
        const wrongPassword = await api('/api/auth/login', {
            method: 'POST',
            body: { username: USERNAME, password: 'wrong-pass1' },
            token: null,
        });
        const unknownUser = await api('/api/auth/login', {
            method: 'POST',
            body: { username: 'nobody', password: PASSWORD },
            token: null,
        });

        expect(wrongPassword.status).toBe(401);
        expect(unknownUser.status).toBe(401);
        expect(await wrongPassword.json()).toEqual({ error: 'Invalid username or password', type: 'UnauthorizedError' });
        expect(await unknownUser.json()).toEqual({ error: 'Invalid username or password', type: 'UnauthorizedError' });
    });

    it('matches usernames case-insensitively', async () => {
        const res = await api('/api/auth/login', {
            method: 'POST',
            body: { username: '  OWNER ', password: PASSWORD },
            token: null,
        });
        expect(res.status).toBe(200);
    });

    it('sets an HttpOnly session cookie that authenticates requests', async () => {
        const login = await api('/api/auth/login', {
            method: 'POST',
            body: { username: USERNAME, password: PASSWORD },
            token: null,
        });
        const setCookie = login.headers.get('set-cookie') ?? '';
        expect(setCookie).toContain('auth_token=');
        expect(setCookie).toContain('HttpOnly');

        const cookie = setCookie.split(';')[0] ?? '';
        const me = await api('/api/auth/me', { token: null, cookie });
        expect(me.status).toBe(200);
        expect(await me.json()).toMatchObject({ operator: { username: USERNAME } });
    });

    it('clears the cookie on logout', async () => {
        const res = await api('/api/auth/logout', { method: 'POST' });
        expect(res.status).toBe(200);
        expect(res.headers.get('set-cookie')).toContain('auth_token=;');
    });

    it('ends existing sessions when the password changes', async () => {
        const wrongCurrent = await api('/api/auth/change-password', {
            method: 'POST',
            body: { currentPassword: 'not-it-1', newPassword: 'newpass99' },
        });
        expect(wrongCurrent.status).toBe(401);

        const changed = await api('/api/auth/change-password', {
            method: 'POST',
            body: { currentPassword: PASSWORD, newPassword: 'newpass99' },
        });
        expect(changed.status).toBe(200);

        expect((await api('/api/customers')).status).toBe(401);

        const relogin = await api('/api/auth/login', {
            method: 'POST',
            body: { username: USERNAME, password: 'newpass99' },
            token: null,
        });
        const fresh = loginResponseSchema.parse(await relogin.json()).token;
        expect((await api('/api/customers', { token: fresh })).status).toBe(200);
    });

    it('rejects a weak new password', async () => {
        const res = await api('/api/auth/change-password', {
            method: 'POST',
            body: { currentPassword: PASSWORD, newPassword: 'short' },
        });
        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: 'Password must be at least 8 characters long' });
    });
});

describe('customers', () => {
    it('creates, reads, updates and deletes a customer', async () => {
        const created = await api('/api/customers', {
            method: 'POST',
            body: {
                name: 'Ann Lee',
                email: 'ann@example.com',
                phone: '',
                city: 'Springfield',
                country: 'US',
                externalCustomerId: 'cust-42',
                note: 'Prefers email',
                createdAt: '2024-01-05',
            },
        });
        expect(created.status).toBe(201);
        const { id } = recordSchema.parse(await created.json());

        const fetched = await api(`/api/customers/${id}`);
        expect(await fetched.json()).toEqual({
            id,
            createdAt: '2024-01-05',
            name: 'Ann Lee',
            email: 'ann@example.com',
            phone: null,
            city: 'Springfield',
            country: 'US',
            externalCustomerId: 'cust-42',
            note: 'Prefers email',
        });

        const updated = await api(`/api/customers/${id}`, { method: 'PUT', body: { name: 'Ann Smith', city: 'Shelbyville' } });
        expect(await updated.json()).toMatchObject({ id, name: 'Ann Smith', city: 'Shelbyville', email: null, createdAt: '2024-01-05' });

        const deleted = await api(`/api/customers/${id}`, { method: 'DELETE' });
        expect(await deleted.json()).toEqual({ success: true });

        expect((await api(`/api/customers/${id}`)).status).toBe(404);
        expect(await (await api('/api/customers')).json()).toEqual({ customers: [] });
    });

    it('returns 404 when updating or deleting a missing customer', async () => {
        expect((await api('/api/customers/999', { method: 'PUT', body: { name: 'X' } })).status).toBe(404);
        expect((await api('/api/customers/999', { method: 'DELETE' })).status).toBe(404);
    });

    it('rejects a missing name and a bad id', async () => {
        const res = await api('/api/customers', { method: 'POST', body: { email: 'x@example.com' } });
        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: 'Name is required', type: 'ValidationError' });

        expect((await api('/api/customers/abc')).status).toBe(400);
    });

    it('searches and rejects malformed dates', async () => {
        await createRecord('/api/customers', { name: 'Ann Lee', createdAt: '2024-01-05' });
        await createRecord('/api/customers', { name: 'Bob Stone', createdAt: '2024-01-06' });

        const res = await api('/api/customers?search=ANN');
        const body = z.object({ customers: z.array(z.object({ name: z.string() })) }).parse(await res.json());
        expect(body.customers.map((c) => c.name)).toEqual(['Ann Lee']);

        const bad = await api('/api/customers?start_date=2024-13-01');
        expect(bad.status).toBe(400);
    });
});

describe('orders', () => {
    it('rejects a reference to a customer that does not exist', async () => {
        const res = await api('/api/orders', { method: 'POST', body: { orderNumber: 'A-1', totalAmount: 10, customerId: 999 } });
        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ type: 'ValidationError', error: 'Customer 999 does not exist' });
    });

    it('stores the customer and reports total sales', async () => {
        const customerId = await createRecord('/api/customers', { name: 'Ann Lee' });
        const created = await api('/api/orders', {
            method: 'POST',
            body: { orderNumber: 'A-1', orderDate: '2024-01-05', totalAmount: '50', customerId, paymentStatus: 'Pending' },
        });
        expect(await created.json()).toMatchObject({
            orderNumber: 'A-1',
            totalAmount: 50,
            currency: 'USD',
            customerId,
            customerName: 'Ann Lee',
            paymentStatus: 'Pending',
            fulfillmentStatus: null,
        });
        await createRecord('/api/orders', { orderNumber: 'A-2', orderDate: '2024-02-10', totalAmount: 75 });

        const list = await api('/api/orders');
        expect(await list.json()).toMatchObject({ totalSales: 125 });

        const january = await api('/api/orders?start_date=2024-01-01&end_date=2024-01-31');
        expect(await january.json()).toMatchObject({ totalSales: 50 });
    });

    it('rejects a negative amount', async () => {
        const res = await api('/api/orders', { method: 'POST', body: { orderNumber: 'A-1', totalAmount: -5 } });
        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: 'Total amount must not be negative' });
    });

    it('defaults the order date to today', async () => {
        const res = await api('/api/orders', { method: 'POST', body: { orderNumber: 'A-1', totalAmount: 1 } });
        const body = z.object({ orderDate: z.string() }).parse(await res.json());
        expect(body.orderDate).toBe(new Date().toISOString().slice(0, 10));
    });
});

describe('expenses', () => {
    it('lists with totals and filters by type', async () => {
        await createRecord('/api/expenses', { date: '2024-01-02', type: 'expense', category: 'Rent', amount: 500 });
        await createRecord('/api/expenses', { date: '2024-01-03', type: 'income', category: 'Sales', amount: 900 });

        const all = await api('/api/expenses');
        expect(await all.json()).toMatchObject({ totalIncome: 900, totalExpense: 500, net: 400 });

        const income = await api('/api/expenses?filter_type=income');
        const body = z.object({ entries: z.array(z.object({ category: z.string() })), net: z.number() }).parse(await income.json());
        expect(body.entries.map((e) => e.category)).toEqual(['Sales']);
        expect(body.net).toBe(900);

        expect((await api('/api/expenses?filter_type=refund')).status).toBe(400);
    });

    it('defaults type and category on create', async () => {
        const res = await api('/api/expenses', { method: 'POST', body: { date: '2024-01-02', amount: 20 } });
        expect(await res.json()).toMatchObject({ type: 'expense', category: 'General', amount: 20 });
    });

    it('keeps the stored type and category when an update omits them', async () => {
        const id = await createRecord('/api/expenses', { date: '2024-01-03', type: 'income', category: 'Sales', amount: 900 });

        const res = await api(`/api/expenses/${id}`, { method: 'PUT', body: { amount: 950 } });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ date: '2024-01-03', type: 'income', category: 'Sales', amount: 950 });
        expect(await (await api('/api/expenses')).json()).toMatchObject({ totalIncome: 950, totalExpense: 0 });
    });
});

describe('tasks', () => {
    it('filters by status and search', async () => {
        await createRecord('/api/tasks', { date: '2024-01-02', title: 'Call supplier', status: 'In Progress' });
        await createRecord('/api/tasks', { date: '2024-01-03', title: 'Restock shelves' });

        const res = await api('/api/tasks?status_filter=In%20Progress');
        const body = z.object({ tasks: z.array(z.object({ title: z.string(), status: z.string() })) }).parse(await res.json());
        expect(body.tasks).toEqual([{ title: 'Call supplier', status: 'In Progress' }]);

        const search = await api('/api/tasks?search=restock');
        const found = z.object({ tasks: z.array(z.object({ status: z.string() })) }).parse(await search.json());
        expect(found.tasks).toEqual([{ status: 'Pending' }]);
    });

    it('keeps the stored status when an update omits it', async () => {
        const id = await createRecord('/api/tasks', { date: '2024-01-02', title: 'Call supplier', status: 'Done' });

        const res = await api(`/api/tasks/${id}`, { method: 'PUT', body: { title: 'Call supplier again' } });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ title: 'Call supplier again', status: 'Done', date: '2024-01-02' });
    });
});

describe('export', () => {
    beforeEach(async () => {
        await createRecord('/api/orders', { orderNumber: 'A-1', orderDate: '2024-01-05', totalAmount: 50, paymentStatus: 'Pending' });
        await createRecord('/api/orders', { orderNumber: 'A-2', orderDate: '2024-02-10', totalAmount: 75, fulfillmentStatus: 'Fulfilled' });
    });

    it('downloads a workbook with only the orders in range', async () => {
        const res = await api('/api/export/orders?start_date=2024-01-01&end_date=2024-01-31');

        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe(XLSX_TYPE);
        expect(res.headers.get('content-disposition')).toBe('attachment; filename="orders_2024-01-01_2024-01-31.xlsx"');

        const sheet = (await loadWorkbook(res)).getWorksheet('Orders');
        expect(sheet?.rowCount).toBe(2);
        expect(sheet?.getRow(2).getCell(3).value).toBe('A-1');
        expect(sheet?.getRow(2).getCell(5).value).toBe(50);
        expect(sheet?.getRow(2).getCell(7).value).toBe('Pending');
    });

    it('writes "all" for missing bounds in the filename', async () => {
        const res = await api('/api/export/orders');
        expect(res.headers.get('content-disposition')).toBe('attachment; filename="orders_all_all.xlsx"');
        expect((await loadWorkbook(res)).getWorksheet('Orders')?.rowCount).toBe(3);
    });

    it('returns only the header row when start is after end', async () => {
        const res = await api('/api/export/orders?start_date=2024-03-01&end_date=2024-01-01');
        expect(res.status).toBe(200);

        const sheet = (await loadWorkbook(res)).getWorksheet('Orders');
        expect(sheet?.rowCount).toBe(1);
        expect(sheet?.getRow(1).getCell(1).value).toBe('ID');
    });

    it('filters expenses by type', async () => {
        await createRecord('/api/expenses', { date: '2024-01-02', type: 'expense', category: 'Rent', amount: 500 });
        await createRecord('/api/expenses', { date: '2024-01-03', type: 'income', category: 'Sales', amount: 900 });

        const expenseOnly = (await loadWorkbook(await api('/api/export/expenses?filter_type=expense'))).getWorksheet('Expenses');
        expect(expenseOnly?.rowCount).toBe(2);
        expect(expenseOnly?.getRow(2).getCell(3).value).toBe('expense');

        const all = (await loadWorkbook(await api('/api/export/expenses?filter_type=all'))).getWorksheet('Expenses');
        expect(all?.rowCount).toBe(3);
    });

    it('rejects malformed dates without sending a file', async () => {
        const res = await api('/api/export/orders?start_date=01-01-2024');
        expect(res.status).toBe(400);
        expect(res.headers.get('content-type')).toContain('application/json');
        expect(await res.json()).toMatchObject({ type: 'ValidationError', error: 'Invalid date, expected YYYY-MM-DD' });
    });

    it('returns 404 for an unknown section', async () => {
        expect((await api('/api/export/invoices')).status).toBe(404);
    });

    it('no longer exports a deleted record', async () => {
        const id = await createRecord('/api/tasks', { date: '2024-01-04', title: 'Temporary' });
        await api(`/api/tasks/${id}`, { method: 'DELETE' });

        const sheet = (await loadWorkbook(await api('/api/export/tasks'))).getWorksheet('Tasks');
        expect(sheet?.rowCount).toBe(1);
    });
});

describe('metrics', () => {
    function requestCount(lines: string[], method: string, endpoint: string): string | undefined {
        return lines.find((line) =>
            line.startsWith('storekeep_request_total{') &&
            line.includes(`method="${method}"`) &&
            line.includes(`endpoint="${endpoint}"`)
        );
    }

    it('serves gauges and request counts without a token', async () => {
        const customerId = await createRecord('/api/customers', { name: 'Ann' });
        await createRecord('/api/orders', { orderNumber: 'A-1', totalAmount: 30 });
        await createRecord('/api/expenses', { type: 'income', amount: 40 });
        await createRecord('/api/tasks', { title: 'Call supplier' });

        expect((await api(`/api/customers/${customerId}`)).status).toBe(200);
        expect((await api('/api/customers/999')).status).toBe(404);
        expect((await api('/api/nope')).status).toBe(404);

        const res = await api('/metrics', { token: null });
        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toMatch(/^text\/plain/);

        const lines = (await res.text()).split('\n');
        expect(lines).toEqual(expect.arrayContaining([
            'storekeep_customers_total 1',
            'storekeep_orders_total 1',
            'storekeep_income_total 40',
            'storekeep_expense_total 0',
            'storekeep_open_tasks_total 1',
            'storekeep_orders_today 1',
            'storekeep_income_today 40',
        ]));
        expect(requestCount(lines, 'GET', '/api/customers/:id')).toMatch(/ 2$/);
        expect(requestCount(lines, 'POST', '/api/customers')).toMatch(/ 1$/);
        expect(requestCount(lines, 'GET', '/api/nope')).toBeUndefined();
        expect(requestCount(lines, 'GET', '/metrics')).toBeUndefined();
    });
});

describe('dashboard', () => {
    it('summarizes records', async () => {
        await createRecord('/api/customers', { name: 'Ann Lee' });
        await createRecord('/api/tasks', { title: 'Open task' });
        await createRecord('/api/tasks', { title: 'Closed task', status: 'Done' });

        const res = await api('/api/dashboard');
        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            stats: { totalCustomers: 1, totalOrders: 0, openTasks: 1, net: 0 },
        });
    });
});
