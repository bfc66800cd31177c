import http from 'node:http';
import type { Logger } from 'pino';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryCounterStore } from '../counter-store/memory-store';
import type { CounterStore } from '../counter-store/types';
import { createGateway, type Gateway } from '../gateway';
import {
    FailingStore,
    GatedStore,
    capturingLogger,
    echoBackend,
    listen,
    openRequest,
    refusedPort,
    silentTcpServer,
    signToken,
    testConfig,
    testLogger,
    type EchoRequest,
    type RunningServer,
} from './helpers';

type Overrides = NonNullable<Parameters<typeof testConfig>[0]>;

const SERVICES = ['auth-service', 'transaction-service', 'user-service', 'reporting-service', 'aml-service'];

describe('gateway', () => {
    let backend: RunningServer;
    let received: EchoRequest[];
    let gateway: Gateway;
    let server: RunningServer;
    let clock: number;

    beforeEach(async () => {
        const echo = echoBackend();
        received = echo.received;
        backend = await listen(echo.app);
        clock = 0;
    });

    afterEach(async () => {
        await server.close();
        gateway.close();
        await backend.close();
    });

    /** Every service points at the echo backend unless overridden or left out. */
    async function start(
        overrides: Overrides = {},
        store: CounterStore = new MemoryCounterStore(),
        omit: string[] = [],
        logger: Logger = testLogger(),
    ): Promise<void> {
        const services = Object.fromEntries(
            SERVICES.filter(name => !omit.includes(name)).map(name => [name, { url: backend.url }]),
        );
        const config = testConfig({ ...overrides, services: { ...services, ...overrides.services } });
        gateway = createGateway({ config, logger, store, now: () => clock });
        server = await listen(gateway.app);
    }

    function call(path: string, init: RequestInit = {}): Promise<Response> {
        return fetch(`${server.url}${path}`, init);
    }

    async function bearer(sub = 'user-42'): Promise<Record<string, string>> {
        return { authorization: `Bearer ${await signToken({ sub })}` };
    }

    describe('outside the route groups', () => {
        it('answers health checks', async () => {
            await start();
            const res = await call('/health');

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ status: 'UP' });
        });

        it('answers 404 for unknown paths', async () => {
            await start();
            const res = await call('/nothing/here');

            expect(res.status).toBe(404);
            expect(await res.json()).toEqual({ error: 'Not found' });
            expect(received).toHaveLength(0);
        });

        it('reports ready while the counting store answers', async () => {
            await start();
            const res = await call('/ready');

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ status: 'READY', store: 'memory' });
        });

        it('reports not ready when the counting store is down', async () => {
            await start({}, new FailingStore());
            const res = await call('/ready');

            expect(res.status).toBe(503);
            expect(await res.json()).toEqual({ status: 'NOT_READY', store: 'failing' });
        });

        it('lists circuit breaker statistics per service', async () => {
            await start();
            await (await call('/api/users/1', { headers: await bearer() })).text();

            const res = await call('/health/circuits');
            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({
                circuitBreakers: {
                    'user-service': { name: 'user-service', state: 'CLOSED', totalAttempts: 1, totalSuccesses: 1, inFlight: 0 },
                    'aml-service': { name: 'aml-service', state: 'CLOSED', totalAttempts: 0 },
                },
            });
        });

        it('sets security headers on every response', async () => {
            await start();
            const responses = [
                await call('/health'),
                await call('/nothing/here'),
                await call('/api/auth/login', { method: 'POST' }),
            ];

            for (const res of responses) {
                expect(res.headers.get('x-content-type-options')).toBe('nosniff');
                expect(res.headers.get('x-frame-options')).toBe('SAMEORIGIN');
                expect(res.headers.get('x-xss-protection')).toBe('1; mode=block');
            }
            expect(responses.map(res => res.status)).toEqual([200, 404, 200]);
        });
    });

    describe('forwarding', () => {
        it('streams a public request to its backend with the prefix stripped', async () => {
            await start();
            const res = await call('/api/auth/login', {
                method: 'POST',
                headers: { 'content-type': 'application/json' },
                body: JSON.stringify({ username: 'alice' }),
            });

            expect(res.status).toBe(200);
            expect(received).toHaveLength(1);
            expect(received[0].method).toBe('POST');
            expect(received[0].url).toBe('/auth/login');
            expect(received[0].body).toBe('{"username":"alice"}');
            expect(res.headers.get('x-ratelimit-limit')).toBe('5');
            expect(res.headers.get('x-ratelimit-remaining')).toBe('4');
        });

        it('generates a request id, echoes it and passes it on', async () => {
            await start();
            const res = await call('/api/auth/login', { method: 'POST' });
            const requestId = res.headers.get('x-request-id');

            expect(requestId).toMatch(/^[0-9a-f-]{36}$/);
            expect(received[0].headers['x-request-id']).toBe(requestId);
        });

        it('passes identity and trace headers to protected backends', async () => {
            await start();
            const res = await call('/api/users/42?x=1', { headers: { ...(await bearer()), 'x-request-id': 'trace-123' } });

            expect(res.status).toBe(200);
            expect(res.headers.get('x-request-id')).toBe('trace-123');
            expect(received[0].url).toBe('/users/42?x=1');
            expect(received[0].headers['x-user-id']).toBe('user-42');
            expect(received[0].headers['x-request-id']).toBe('trace-123');
            expect(received[0].headers['x-forwarded-for']).toBe('127.0.0.1');
            expect(received[0].headers.host).toBe(`127.0.0.1:${backend.port}`);
        });

        it('drops an identity header sent by the caller', async () => {
            await start();
            await call('/api/auth/login', { method: 'POST', headers: { 'x-user-id': 'admin' } });

            expect(received[0].headers['x-user-id']).toBeUndefined();
        });

        it('relays backend error statuses without counting them as breaker failures', async () => {
            await start();
            const headers = await bearer();

            const statuses: number[] = [];
            for (let i = 0; i < 6; i++) {
                const res = await call('/api/users/status/500', { headers });
                await res.text();
                statuses.push(res.status);
            }

            expect(statuses).toEqual([500, 500, 500, 500, 500, 500]);
            expect(gateway.breakers.state('user-service')).toBe('CLOSED');
            expect(gateway.breakers.inFlight()).toBe(0);
        });

        it('answers preflight requests before any admission check', async () => {
            await start();
            const res = await call('/api/transfers', {
                method: 'OPTIONS',
                headers: { origin: 'https://bank.example', 'access-control-request-method': 'POST' },
            });

            expect(res.status).toBe(204);
            expect(res.headers.get('access-control-allow-origin')).toBe('*');
            expect(received).toHaveLength(0);
        });
    });

    describe('authentication gate', () => {
        it('rejects a request without credentials before anything else', async () => {
            await start();
            const res = await call('/api/transfers');

            expect(res.status).toBe(401);
            expect(res.headers.get('www-authenticate')).toBe('Bearer');
            expect(await res.json()).toEqual({ error: 'Missing authorization header' });
            expect(received).toHaveLength(0);
        });

        it('rejects malformed, invalid and expired tokens', async () => {
            await start();
            const expired = await signToken({ sub: 'user-42', expiresAt: Math.floor(Date.now() / 1000) - 60 });

            const bodies: unknown[] = [];
            for (const authorization of ['Token abc', 'Bearer not-a-jwt', `Bearer ${expired}`]) {
                bodies.push(await (await call('/api/users/1', { headers: { authorization } })).json());
            }

            expect(bodies).toEqual([
                { error: 'Invalid authorization format' },
                { error: 'Invalid token' },
                { error: 'Token has expired' },
            ]);
            expect(received).toHaveLength(0);
        });

        it('rejects revoked tokens', async () => {
            await start();
            const token = await signToken({ sub: 'user-42' });
            await gateway.blacklist.revoke(token, 60_000);

            const res = await call('/api/users/1', { headers: { authorization: `Bearer ${token}` } });
            expect(res.status).toBe(401);
            expect(await res.json()).toEqual({ error: 'Token has been revoked' });
        });

        it('answers 503 when the blacklist cannot be checked and the policy is deny', async () => {
            await start({ onBlacklistError: 'deny' }, new FailingStore());
            const res = await call('/api/users/1', { headers: await bearer() });

            expect(res.status).toBe(503);
            expect(await res.json()).toEqual({ error: 'Service temporarily unavailable' });
            expect(received).toHaveLength(0);
        });
    });

    describe('rate limiting', () => {
        it('denies the sixth login from one address within a minute', async () => {
            await start();

            const statuses: number[] = [];
            let last: Response | undefined;
            for (let i = 0; i < 6; i++) {
                last = await call('/api/auth/login', { method: 'POST' });
                statuses.push(last.status);
            }

            expect(statuses).toEqual([200, 200, 200, 200, 200, 429]);
            expect(received).toHaveLength(5);

            const retryAfter = Number(last?.headers.get('retry-after'));
            expect(retryAfter).toBeGreaterThanOrEqual(1);
            expect(retryAfter).toBeLessThanOrEqual(60);
            expect(last?.headers.get('x-ratelimit-remaining')).toBe('0');
            expect(await last?.json()).toEqual({ error: 'Rate limit exceeded', retry_after: retryAfter });
        });

        it('counts protected routes per user, and only after authentication', async () => {
            await start({ policies: { transfers: { quota: 2, windowMs: 60_000 } } });
            const alice = await bearer('user-42');
            const bob = await bearer('user-7');

            expect((await call('/api/transfers')).status).toBe(401);

            const statuses: number[] = [];
            for (const headers of [alice, alice, alice, bob]) {
                statuses.push((await call('/api/transfers', { method: 'POST', headers })).status);
            }
            expect(statuses).toEqual([200, 200, 429, 200]);
        });

        it('shares one quota across the paths of a route group', async () => {
            await start({ policies: { default: { quota: 1, windowMs: 60_000 } } });
            const headers = await bearer();

            expect((await call('/api/users/1', { headers })).status).toBe(200);
            expect((await call('/api/users/2', { headers })).status).toBe(429);
            expect((await call('/api/reporting/daily', { headers })).status).toBe(200);
        });

        it('lets requests through without quota headers when the store is down', async () => {
            const store = new FailingStore();
            await start({ policies: { auth: { quota: 1, windowMs: 60_000 } } }, store);

            const first = await call('/api/auth/login', { method: 'POST' });
            const second = await call('/api/auth/login', { method: 'POST' });

            expect([first.status, second.status]).toEqual([200, 200]);
            expect(second.headers.get('x-ratelimit-limit')).toBeNull();
            expect(received).toHaveLength(2);
            expect(store.calls).toBe(2);
        });

        it('refuses requests when the store is down and the policy is deny', async () => {
            await start({ onStoreError: 'deny' }, new FailingStore());
            const res = await call('/api/auth/login', { method: 'POST' });

            expect(res.status).toBe(503);
            expect(await res.json()).toEqual({ error: 'Service temporarily unavailable' });
            expect(received).toHaveLength(0);
        });
    });

    describe('circuit breaking', () => {
        it('opens after five transport failures and stops calling the backend', async () => {
            let attempts = 0;
            const dropping = await listen((req) => {
                attempts++;
                req.socket.destroy();
            });
            await start({
                services: { 'transaction-service': { url: dropping.url } },
                policies: { transfers: { quota: 6, windowMs: 60_000 } },
            });
            const headers = await bearer();

            try {
                const bodies: unknown[] = [];
                for (let i = 0; i < 6; i++) {
                    const res = await call('/api/transfers', { method: 'POST', headers });
                    expect(res.status).toBe(503);
                    bodies.push(await res.json());
                }

                expect(attempts).toBe(5);
                expect(gateway.breakers.state('transaction-service')).toBe('OPEN');
                expect(bodies[5]).toEqual({ error: 'Service temporarily unavailable', service: 'transaction-service' });
                expect(new Set(bodies.map(body => JSON.stringify(body))).size).toBe(1);

                // Rate limiting runs before the breaker
                expect((await call('/api/transfers', { method: 'POST', headers })).status).toBe(429);
                expect(gateway.breakers.inFlight()).toBe(0);
            } finally {
                await dropping.close();
            }
        });

        it('probes after the cool-down and closes once the backend recovers', async () => {
            let healthy = false;
            let attempts = 0;
            const flaky = await listen((req, res) => {
                attempts++;
                if (!healthy) {
                    req.socket.destroy();
                    return;
                }
                res.end('ok');
            });
            await start({ services: { 'transaction-service': { url: flaky.url } } });
            const headers = await bearer();

            try {
                for (let i = 0; i < 5; i++) await call('/api/transfers', { headers });
                expect(gateway.breakers.state('transaction-service')).toBe('OPEN');

                clock += 29_999;
                expect((await call('/api/transfers', { headers })).status).toBe(503);
                expect(attempts).toBe(5);

                clock += 1;
                healthy = true;
                const statuses: number[] = [];
                for (let i = 0; i < 5; i++) {
                    const res = await call('/api/transfers', { headers });
                    expect(await res.text()).toBe('ok');
                    statuses.push(res.status);
                }

                expect(statuses).toEqual([200, 200, 200, 200, 200]);
                expect(attempts).toBe(10);
                expect(gateway.breakers.state('transaction-service')).toBe('CLOSED');
            } finally {
                await flaky.close();
            }
        });

        it('treats a refused connection as unavailable', async () => {
            const port = await refusedPort();
            await start({ services: { 'user-service': { url: `http://127.0.0.1:${port}` } } });

            const res = await call('/api/users/1', { headers: await bearer() });
            expect(res.status).toBe(503);
            expect(await res.json()).toEqual({ error: 'Service temporarily unavailable', service: 'user-service' });
            expect(gateway.breakers.get('user-service')?.getStats().consecutiveFailures).toBe(1);
        });

        it('treats a backend that never answers as unavailable', async () => {
            await start({ services: { 'reporting-service': { url: backend.url, timeoutMs: 200 } } });

            const res = await call('/api/reporting/slow', { headers: await bearer() });
            expect(res.status).toBe(503);
            expect(await res.json()).toEqual({ error: 'Service temporarily unavailable', service: 'reporting-service' });
            expect(gateway.breakers.inFlight()).toBe(0);
        });

        it('bounds a TLS handshake the backend never completes', async () => {
            const silent = await silentTcpServer();
            const capture = capturingLogger('error');
            await start({
                services: { 'user-service': { url: `https://127.0.0.1:${silent.port}` } },
                transport: { tlsHandshakeTimeoutMs: 200 },
            }, new MemoryCounterStore(), [], capture.logger);

            try {
                const res = await call('/api/users/1', { headers: await bearer() });
                expect(res.status).toBe(503);
                expect(await res.json()).toEqual({ error: 'Service temporarily unavailable', service: 'user-service' });

                const line = capture.lines().find(entry => entry.msg === 'Proxy forwarding error');
                expect(line?.err).toMatchObject({ message: 'tls-handshake timed out after 200ms', phase: 'tls-handshake' });
                expect(gateway.breakers.get('user-service')?.getStats().consecutiveFailures).toBe(1);
            } finally {
                await silent.close();
            }
        });

        it('skips the breaker for services that disable it', async () => {
            const port = await refusedPort();
            await start({ services: { 'user-service': { url: `http://127.0.0.1:${port}`, circuitBreaker: false } } });
            const headers = await bearer();

            for (let i = 0; i < 6; i++) await call('/api/users/1', { headers });

            expect(gateway.breakers.state('user-service')).toBeUndefined();
            const res = await call('/api/users/1', { headers });
            expect(await res.json()).toEqual({ error: 'Service temporarily unavailable', service: 'user-service' });
        });
    });

    describe('caller disconnects', () => {
        it('never calls the backend once the caller left during the quota check', async () => {
            const store = new GatedStore();
            await start({}, store);

            const req = openRequest(`${server.url}/api/users/1`, await bearer());
            await store.entered;
            req.destroy();
            await new Promise(resolve => setTimeout(resolve, 100));
            store.open();

            await vi.waitFor(() => {
                expect(gateway.breakers.get('user-service')?.getStats().totalAttempts).toBe(1);
            });
            await new Promise(resolve => setTimeout(resolve, 50));

            expect(gateway.breakers.inFlight()).toBe(0);
            expect(received).toHaveLength(0);
        });

        it('frees half-open slots when waiting callers hang up', async () => {
            let mode: 'drop' | 'hang' | 'ok' = 'drop';
            const flaky = await listen((req, res) => {
                if (mode === 'drop') {
                    req.socket.destroy();
                } else if (mode === 'ok') {
                    res.end('ok');
                }
            });
            await start({
                services: { 'transaction-service': { url: flaky.url } },
                policies: { transfers: { quota: 100, windowMs: 60_000 } },
            });
            const headers = await bearer();

            try {
                for (let i = 0; i < 5; i++) await (await call('/api/transfers', { headers })).text();
                clock += 30_000;
                mode = 'hang';

                const waiting = Array.from({ length: 5 }, () => openRequest(`${server.url}/api/transfers`, headers));
                await vi.waitFor(() => expect(gateway.breakers.inFlight()).toBe(5));
                expect(gateway.breakers.state('transaction-service')).toBe('HALF_OPEN');

                const rejected = await call('/api/transfers', { headers });
                expect(rejected.status).toBe(503);
                await rejected.text();

                for (const req of waiting) req.destroy();
                await vi.waitFor(() => expect(gateway.breakers.inFlight()).toBe(0));

                mode = 'ok';
                const res = await call('/api/transfers', { headers });
                expect(res.status).toBe(200);
                expect(await res.text()).toBe('ok');
                expect(gateway.breakers.state('transaction-service')).toBe('HALF_OPEN');
            } finally {
                await flaky.close();
            }
        });
    });

    describe('request bodies', () => {
        it('refuses a declared length over the limit before authentication', async () => {
            await start({ bodyLimitBytes: 16 });
            const res = await call('/api/transfers', { method: 'POST', body: 'x'.repeat(17) });

            expect(res.status).toBe(413);
            expect(await res.json()).toEqual({ error: 'Request body too large' });
            expect(received).toHaveLength(0);
        });

        it('accepts a body exactly at the limit', async () => {
            await start({ bodyLimitBytes: 16 });
            const res = await call('/api/auth/login', { method: 'POST', body: 'x'.repeat(16) });

            expect(res.status).toBe(200);
            expect(received[0].body).toBe('x'.repeat(16));
        });

        it('stops a chunked body that grows past the limit', async () => {
            await start({ bodyLimitBytes: 16 });

            const res = await new Promise<{ status: number; body: string }>((resolve, reject) => {
                const req = http.request(`${server.url}/api/auth/register`, { method: 'POST' }, (response) => {
                    let body = '';
                    response.setEncoding('utf8');
                    response.on('data', (chunk: string) => {
                        body += chunk;
                    });
                    response.on('end', () => resolve({ status: response.statusCode ?? 0, body }));
                });
                req.on('error', reject);
                req.write('x'.repeat(32));
                req.end();
            });

            expect(res.status).toBe(413);
            expect(JSON.parse(res.body)).toEqual({ error: 'Request body too large' });
            expect(received).toHaveLength(0);
            expect(gateway.breakers.inFlight()).toBe(0);
            expect(gateway.breakers.get('auth-service')?.getStats().totalFailures).toBe(0);
        });
    });

    describe('service table problems', () => {
        it('answers 503 for a service with no configuration', async () => {
            await start({}, new MemoryCounterStore(), ['aml-service']);

            const res = await call('/api/aml/alerts', { headers: await bearer() });
            expect(res.status).toBe(503);
            expect(await res.json()).toEqual({ error: 'Service not configured' });
            expect(gateway.breakers.get('aml-service')).toBeUndefined();
            expect(gateway.breakers.inFlight()).toBe(0);
        });

        it('answers 500 for a service with an unusable URL', async () => {
            await start({ services: { 'user-service': { url: 'not a url' } } });

            const res = await call('/api/users/1', { headers: await bearer() });
            expect(res.status).toBe(500);
            expect(await res.json()).toEqual({ error: 'Configuration error' });
            expect(gateway.breakers.get('user-service')?.getStats().totalAttempts).toBe(0);
        });
    });

    it('forwards request bodies sent with Expect: 100-continue', async () => {
        await start();

        const status = await new Promise<number>((resolve, reject) => {
            const req = http.request(`${server.url}/api/auth/register`, {
                method: 'POST',
                headers: { expect: '100-continue', 'content-type': 'text/plain' },
            }, (res) => {
                res.resume();
                res.on('end', () => resolve(res.statusCode ?? 0));
            });
            req.on('error', reject);
            req.on('continue', () => req.end('hello'));
        });

        expect(status).toBe(200);
        expect(received[0].body).toBe('hello');
    });
});
