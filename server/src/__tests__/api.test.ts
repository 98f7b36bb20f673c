/**
 * HTTP tests for the Express app
 *
 * Each test gets a fresh in-memory store and an app listening on a random
 * local port.
 */

import type { Server } from 'node:http';
import { createApp } from '../app.js';
import { MemoryStore } from './support/memoryStore.js';

let server: Server;
let baseUrl: string;

beforeEach(async () => {
    const app = createApp({ store: new MemoryStore() });
    server = await new Promise<Server>((resolve) => {
        const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
});

function call(path: string, init: RequestInit = {}, token?: string): Promise<Response> {
    const headers = new Headers(init.headers);
    if (token) headers.set('Authorization', `Bearer ${token}`);
    if (init.body !== undefined) headers.set('Content-Type', 'application/json');
    return fetch(`${baseUrl}${path}`, { ...init, headers });
}

function post(path: string, body: unknown, token?: string): Promise<Response> {
    return call(path, { method: 'POST', body: JSON.stringify(body) }, token);
}

async function login(): Promise<string> {
    const res = await post('/api/auth/login', { username: 'admin', password: 'admin' });
    const body: unknown = await res.json();
    if (typeof body !== 'object' || body === null || !('token' in body) || typeof body.token !== 'string') {
        throw new Error('Login did not return a token');
    }
    return body.token;
}

describe('public routes', () => {
    it('answers the health check without a token', async () => {
        const res = await call('/api/health');

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ status: 'ok' });
    });

    it('returns JSON 404 for unknown API paths', async () => {
        const res = await call('/api/nothing-here');

        expect(res.status).toBe(404);
        expect(await res.json()).toEqual({ error: 'Route not found: GET /api/nothing-here', type: 'NotFoundError' });
    });
});

describe('authentication', () => {
    it('requires a token', async () => {
        const res = await call('/api/transactions');

        expect(res.status).toBe(401);
        expect(await res.json()).toEqual({ error: 'Access token required', type: 'UnauthorizedError' });
    });

    it('rejects an invalid token', async () => {
        const res = await call('/api/transactions', {}, 'not-a-token');

        expect(res.status).toBe(403);
        expect(await res.json()).toEqual({ error: 'Invalid or expired token', type: 'ForbiddenError' });
    });

    it('rejects wrong credentials', async () => {
        const res = await post('/api/auth/login', { username: 'admin', password: 'wrong' });

        expect(res.status).toBe(401);
        expect(await res.json()).toEqual({ error: 'Invalid credentials', type: 'UnauthorizedError' });
    });

    it('logs in and sets the auth cookie', async () => {
        const res = await post('/api/auth/login', { username: 'admin', password: 'admin' });

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({ user: { username: 'admin', role: 'admin' } });
        expect(res.headers.get('set-cookie')).toContain('auth_token=');
    });

    it('accepts the token from the cookie', async () => {
        const token = await login();

        const res = await call('/api/auth/me', { headers: { Cookie: `auth_token=${token}` } });

        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ user: { username: 'admin', role: 'admin' } });
    });
});

describe('transactions API', () => {
    it('returns field errors as a 400', async () => {
        const token = await login();

        const res = await post('/api/transactions', { type: 'incoming', amount: 5000, category: 'Client' }, token);

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({
            type: 'ValidationError',
            details: { billNo: 'Bill Number is required for Client payments.' },
        });
    });

    it('rejects a malformed body before the service runs', async () => {
        const token = await login();

        const res = await post('/api/transactions', { type: 'incoming', amount: 'lots' }, token);

        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ error: 'Validation failed', type: 'ValidationError' });
    });

    it('creates, lists and soft deletes', async () => {
        const token = await login();

        const created = await post(
            '/api/transactions',
            { type: 'incoming', date: '2024-03-01', amount: 5000, category: 'Client', billNo: 'B-1' },
            token
        );
        expect(created.status).toBe(201);
        expect(await created.json()).toMatchObject({ id: 1, billNo: 'B-1', isDeleted: false });

        const listed = await call('/api/transactions', {}, token);
        expect(await listed.json()).toMatchObject({ totals: { incoming: 5000, outgoing: 0, net: 5000 } });

        const deleted = await call('/api/transactions/1', { method: 'DELETE' }, token);
        expect(await deleted.json()).toEqual({ success: true });

        const totals = await call('/api/transactions/totals', {}, token);
        expect(await totals.json()).toEqual({ incoming: 0, outgoing: 0, net: 0 });

        const single = await call('/api/transactions/1', {}, token);
        expect(await single.json()).toMatchObject({ id: 1, isDeleted: true });
    });

    it('returns 404 with the resource for a missing row', async () => {
        const token = await login();

        const res = await call('/api/transactions/42', { method: 'DELETE' }, token);

        expect(res.status).toBe(404);
        expect(await res.json()).toMatchObject({ type: 'NotFoundError', resourceId: 42 });
    });

    it('rejects a non-numeric id', async () => {
        const token = await login();

        const res = await call('/api/transactions/abc', {}, token);

        expect(res.status).toBe(400);
    });
});

describe('reports API', () => {
    it('serves the daily summary for a given date', async () => {
        const token = await login();
        await post(
            '/api/transactions',
            { type: 'incoming', date: '2024-03-01', amount: 5000, category: 'Client', billNo: 'B-1' },
            token
        );

        const res = await call('/api/reports/daily?date=2024-03-01', {}, token);

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            date: '2024-03-01',
            today: { incoming: 5000, outgoing: 0, net: 5000 },
            week: { start: '2024-03-02', end: '2024-03-07', totals: { incoming: 0, outgoing: 0, net: 0 } },
            recent: [{ id: 1, billNo: 'B-1' }],
        });
    });
});

describe('inventory API', () => {
    it('adjusts stock and reports the new quantity', async () => {
        const token = await login();
        const created = await post('/api/inventory/hardware', { name: 'Hinges', qtyOnHand: 10 }, token);
        expect(created.status).toBe(201);
        const hinges: unknown = await created.json();
        expect(hinges).toMatchObject({ id: 1, name: 'Hinges', unit: 'pieces', qtyOnHand: 10 });

        const res = await post(
            '/api/inventory/stock/adjust',
            { kind: 'HARDWARE_MATERIAL', itemId: 1, delta: -4, label: 'Used' },
            token
        );

        expect(res.status).toBe(200);
        expect(await res.json()).toMatchObject({
            quantityAfter: 6,
            rollup: null,
            movement: { qtyChange: -4, movementType: 'Used' },
        });
    });

    it('rejects a zero delta and a missing row', async () => {
        const token = await login();
        await post('/api/inventory/hardware', { name: 'Hinges', qtyOnHand: 10 }, token);

        const zero = await post('/api/inventory/stock/adjust', { kind: 'HARDWARE_MATERIAL', itemId: 1, delta: 0 }, token);
        expect(zero.status).toBe(400);
        expect(await zero.json()).toMatchObject({
            details: { delta: 'Quantity change must be a non-zero whole number.' },
        });

        const missing = await post(
            '/api/inventory/stock/adjust',
            { kind: 'HARDWARE_MATERIAL', itemId: 999, delta: 1 },
            token
        );
        expect(missing.status).toBe(404);
        expect(await missing.json()).toMatchObject({ resourceType: 'HARDWARE_MATERIAL', resourceId: 999 });
    });
});

describe('exports and admin', () => {
    it('downloads the filtered transactions as CSV', async () => {
        const token = await login();
        await post(
            '/api/transactions',
            { type: 'incoming', date: '2024-03-01', amount: 5000, category: 'Client', billNo: 'B-1' },
            token
        );

        const res = await call('/api/export/transactions.csv', {}, token);
        const lines = (await res.text()).split('\n');

        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toContain('text/csv');
        expect(lines[0]).toBe('ID,Date,Type,Category,Name,Bill No,Amount,Notes');
        expect(lines[1]).toBe('1,2024-03-01,incoming,Client,,B-1,5000,');
    });

    it('serves the PDF summary', async () => {
        const token = await login();

        const res = await call('/api/export/transactions.pdf', {}, token);
        const bytes = Buffer.from(await res.arrayBuffer());

        expect(res.headers.get('content-type')).toBe('application/pdf');
        expect(bytes.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('seeds the catalog only with the right token', async () => {
        const token = await login();

        const wrong = await post('/api/admin/seed', { token: 'nope' }, token);
        expect(wrong.status).toBe(403);

        const seeded = await post('/api/admin/seed', { token: 'test-seed-token' }, token);
        expect(seeded.status).toBe(200);
        expect(await seeded.json()).toEqual({ created: 54, existing: 0 });
    });
});
