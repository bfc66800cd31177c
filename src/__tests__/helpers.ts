import http from 'node:http';
import net from 'node:net';
import express from 'express';
import { SignJWT } from 'jose';
import pino, { type Logger } from 'pino';
import { parseConfig, type GatewayConfig } from '../config';
import { silentLogger } from '../logger';
import { MemoryCounterStore } from '../counter-store/memory-store';
import type { CounterStore } from '../counter-store/types';

export const TEST_SECRET = 'test-secret-test-secret';

export interface RunningServer {
    url: string;
    port: number;
    close(): Promise<void>;
}

function addressPort(server: net.Server): number {
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    return address.port;
}

async function listenOn(server: http.Server): Promise<RunningServer> {
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const port = addressPort(server);
    return {
        url: `http://127.0.0.1:${port}`,
        port,
        close: () => new Promise<void>((resolve) => {
            server.closeAllConnections();
            server.close(() => resolve());
        }),
    };
}

export function listen(handler: http.RequestListener): Promise<RunningServer> {
    return listenOn(http.createServer(handler));
}

/** TCP server that accepts connections and never writes a byte. */
export async function silentTcpServer(): Promise<{ port: number; close(): Promise<void> }> {
    const sockets = new Set<net.Socket>();
    const server = net.createServer(socket => {
        sockets.add(socket);
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    return {
        port: addressPort(server),
        close: () => new Promise<void>((resolve) => {
            for (const socket of sockets) socket.destroy();
            server.close(() => resolve());
        }),
    };
}

/** Start a request the test can abandon with `destroy()`. */
export function openRequest(url: string, headers: Record<string, string> = {}): http.ClientRequest {
    const req = http.request(url, { headers });
    req.on('error', () => {
        // destroyed by the test
    });
    req.end();
    return req;
}

/** A port nothing listens on. */
export async function refusedPort(): Promise<number> {
    const running = await listen((_req, res) => res.end());
    await running.close();
    return running.port;
}

export interface EchoRequest {
    method: string;
    url: string;
    headers: http.IncomingHttpHeaders;
    body: string;
}

/**
 * Backend that records what it received and echoes it back as JSON.
 * A path ending in /status/<code> answers with that status; one ending
 * in /slow never answers.
 */
export function echoBackend() {
    const received: EchoRequest[] = [];
    const app = express();

    app.use((req, res) => {
        if (/\/slow$/.test(req.path)) return;

        let body = '';
        req.setEncoding('utf8');
        req.on('data', (chunk: string) => {
            body += chunk;
        });
        req.on('end', () => {
            const entry = { method: req.method, url: req.originalUrl, headers: req.headers, body };
            received.push(entry);
            const status = /\/status\/(\d{3})$/.exec(req.path);
            res.status(status ? Number(status[1]) : 200).json(entry);
        });
    });

    return { app, received };
}

export function testLogger(): Logger {
    return silentLogger();
}

/** Logger writing JSON lines into an array, for asserting log events. */
export function capturingLogger(level: pino.Level = 'debug'): { logger: Logger; lines: () => Record<string, unknown>[] } {
    const raw: string[] = [];
    const logger = pino({ level }, { write: (line: string) => { raw.push(line); } });
    return {
        logger,
        lines: () => raw.map((line): Record<string, unknown> => JSON.parse(line)),
    };
}

export function testConfig(overrides: {
    services?: Record<string, { url: string; timeoutMs?: number; circuitBreaker?: boolean }>;
    transport?: { connectTimeoutMs?: number; tlsHandshakeTimeoutMs?: number };
    bodyLimitBytes?: number;
    policies?: Partial<Record<'auth' | 'transfers' | 'default', { quota: number; windowMs: number }>>;
    onStoreError?: 'allow' | 'deny';
    onBlacklistError?: 'allow' | 'deny';
} = {}): GatewayConfig {
    return parseConfig({
        server: { logLevel: 'silent', trustProxy: false, bodyLimitBytes: overrides.bodyLimitBytes },
        transport: overrides.transport ?? {},
        rateLimit: {
            store: 'memory',
            onStoreError: overrides.onStoreError ?? 'allow',
            policies: overrides.policies ?? {},
        },
        security: { jwtSecret: TEST_SECRET, onBlacklistError: overrides.onBlacklistError ?? 'allow' },
        services: overrides.services ?? {},
    });
}

export function signToken(options: { sub?: string; expiresAt?: number; secret?: string; alg?: 'HS256' | 'HS512' } = {}): Promise<string> {
    const jwt = new SignJWT({ role: 'customer' })
        .setProtectedHeader({ alg: options.alg ?? 'HS256' })
        .setIssuedAt()
        .setExpirationTime(options.expiresAt ?? Math.floor(Date.now() / 1000) + 300);
    if (options.sub !== undefined) jwt.setSubject(options.sub);
    return jwt.sign(new TextEncoder().encode(options.secret ?? TEST_SECRET));
}

/** Counting store whose every call fails, like Redis being down. */
export class FailingStore implements CounterStore {
    readonly name = 'failing';
    calls = 0;

    private fail(): never {
        this.calls++;
        throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }

    async incrementWithExpiry(): Promise<number> {
        return this.fail();
    }

    async ttl(): Promise<number | null> {
        return this.fail();
    }

    async exists(): Promise<boolean> {
        return this.fail();
    }

    async setWithExpiry(): Promise<void> {
        this.fail();
    }

    async ping(): Promise<void> {
        this.fail();
    }
}

/** Memory store whose increments wait until the test calls `open()`. */
export class GatedStore extends MemoryCounterStore {
    private signalEntered: () => void = () => undefined;
    private release: () => void = () => undefined;

    /** Resolves once an increment is waiting at the gate */
    readonly entered = new Promise<void>((resolve) => {
        this.signalEntered = resolve;
    });

    private readonly gate = new Promise<void>((resolve) => {
        this.release = resolve;
    });

    open(): void {
        this.release();
    }

    async incrementWithExpiry(key: string, windowMs: number): Promise<number> {
        this.signalEntered();
        await this.gate;
        return super.incrementWithExpiry(key, windowMs);
    }
}
