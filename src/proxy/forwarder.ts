import http from 'node:http';
import https from 'node:https';
import type { Socket } from 'node:net';
import { Transform, type TransformCallback } from 'node:stream';
import { TLSSocket } from 'node:tls';
import type { Logger } from 'pino';
import type { GatewayConfig, ServiceConfig } from '../config';
import { BackendUnavailableError, ClientError, ConfigurationError } from '../errors';
import type { GatewayContext } from '../middleware/types';
import { joinPaths, rewritePath } from './path-rewrite';

// =================================================================
// FORWARDER — the actual reverse proxy
// =================================================================
//
//   client ──▶ gateway ──(pooled keep-alive socket)──▶ backend
//
// Per backend:
//   - one keep-alive Agent (bounded idle pool, idle timeout)
//   - connect and TLS handshake each get their own deadline
//   - Expect: 100-continue waits at most expectContinueTimeoutMs
//     for the backend's 100 before the body is sent anyway
//   - response inactivity is bounded by the service's timeoutMs
//
// OUTCOMES:
//   any HTTP status         → 'responded'   (breaker success)
//   refused/timeout/DNS/TLS → 'transport-error' (breaker failure)
//   caller hung up first    → 'aborted'     (no verdict)
//   body over the limit     → 'body-too-large' (no verdict, 413)
//
// A caller that is already gone when send() starts (it hung up while
// an earlier stage was waiting on Redis) gets 'aborted' without any
// backend call.
//
// The caller never sees transport error text. That stays in logs.
// =================================================================

export interface ServiceTarget {
    name: string;
    url: URL;
    timeoutMs: number;
    circuitBreaker: boolean;
    agent: http.Agent;
}

export type TargetResolution =
    | { kind: 'ok'; target: ServiceTarget }
    | { kind: 'not-configured' }
    | { kind: 'misconfigured'; error: ConfigurationError };

export type ForwardOutcome =
    | { kind: 'responded'; status: number }
    | { kind: 'transport-error'; error: BackendUnavailableError }
    | { kind: 'body-too-large'; error: ClientError }
    | { kind: 'aborted' };

export interface TransportOptions extends Readonly<GatewayConfig['transport']> {
    /** Largest request body streamed to a backend, in bytes */
    maxBodyBytes: number;
}

export const TRACE_HEADER = 'x-request-id';
export const IDENTITY_HEADER = 'x-user-id';

// RFC 7230 §6.1: meaningful for one connection only
const HOP_BY_HOP = new Set([
    'connection',
    'keep-alive',
    'proxy-authenticate',
    'proxy-authorization',
    'proxy-connection',
    'te',
    'trailer',
    'transfer-encoding',
    'upgrade',
]);

export class ForwardTimeoutError extends Error {
    readonly code = 'ETIMEDOUT';

    constructor(
        public readonly phase: 'connect' | 'tls-handshake' | 'response',
        timeoutMs: number,
    ) {
        super(`${phase} timed out after ${timeoutMs}ms`);
        this.name = 'ForwardTimeoutError';
    }
}

export class BodyLimitExceededError extends Error {
    constructor(public readonly limit: number) {
        super(`Request body exceeds ${limit} bytes`);
        this.name = 'BodyLimitExceededError';
    }
}

/** Passes bytes through until more than `limit` have been seen. */
export class BodyCounter extends Transform {
    private seen = 0;

    constructor(private readonly limit: number) {
        super();
    }

    _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
        this.seen += chunk.length;
        if (this.seen > this.limit) {
            callback(new BodyLimitExceededError(this.limit));
            return;
        }
        callback(null, chunk);
    }
}

/**
 * Bound a fresh socket's connect and, for TLS, its handshake. Returns
 * a function that cancels whatever timer is still pending.
 */
export function watchHandshake(
    socket: Socket,
    limits: Pick<TransportOptions, 'connectTimeoutMs' | 'tlsHandshakeTimeoutMs'>,
    onTimeout: (error: ForwardTimeoutError) => void,
): () => void {
    let handshakeTimer: NodeJS.Timeout | undefined;
    const connectTimer = setTimeout(() => {
        onTimeout(new ForwardTimeoutError('connect', limits.connectTimeoutMs));
    }, limits.connectTimeoutMs);

    socket.once('connect', () => {
        clearTimeout(connectTimer);
        if (!(socket instanceof TLSSocket)) return;

        handshakeTimer = setTimeout(() => {
            onTimeout(new ForwardTimeoutError('tls-handshake', limits.tlsHandshakeTimeoutMs));
        }, limits.tlsHandshakeTimeoutMs);
        socket.once('secureConnect', () => clearTimeout(handshakeTimer));
    });

    return () => {
        clearTimeout(connectTimer);
        clearTimeout(handshakeTimer);
    };
}

export class Forwarder {
    private readonly targets: ReadonlyMap<string, TargetResolution>;
    private logger: Logger;

    constructor(
        services: Record<string, ServiceConfig>,
        private transport: TransportOptions,
        private routePrefix: string,
        logger: Logger,
    ) {
        this.logger = logger.child({ component: 'forwarder' });

        const targets = new Map<string, TargetResolution>();
        for (const [name, service] of Object.entries(services)) {
            targets.set(name, this.buildTarget(name, service));
        }
        this.targets = targets;
    }

    resolve(service: string): TargetResolution {
        return this.targets.get(service) ?? { kind: 'not-configured' };
    }

    /**
     * Stream the request to `target` and the response back to the caller.
     * Resolves once the exchange is over; never rejects. On a transport
     * error nothing has been written to the caller yet, unless the
     * backend had already started responding.
     */
    send(ctx: GatewayContext, target: ServiceTarget): Promise<ForwardOutcome> {
        const { req, res } = ctx;
        if (callerGone(req, res)) {
            return Promise.resolve({ kind: 'aborted' });
        }

        const path = joinPaths(target.url.pathname, rewritePath(req.originalUrl, this.routePrefix));
        const cleanups: (() => void)[] = [];
        const body = new BodyCounter(this.transport.maxBodyBytes);

        return new Promise<ForwardOutcome>((resolve) => {
            let settled = false;
            let status: number | undefined;

            const finish = (outcome: ForwardOutcome): void => {
                if (settled) return;
                settled = true;
                for (const cleanup of cleanups) cleanup();
                req.unpipe(body);
                body.unpipe(backendReq);
                resolve(outcome);
            };

            const backendReq = http.request({
                protocol: target.url.protocol,
                hostname: target.url.hostname,
                port: target.url.port || undefined,
                method: req.method,
                path,
                headers: this.outboundHeaders(ctx, target),
                agent: target.agent,
                timeout: target.timeoutMs,
            }, (backendRes) => {
                status = backendRes.statusCode ?? 502;
                ctx.meta.upstreamStatus = status;

                res.writeHead(status, stripHopByHop(backendRes.headers));
                backendRes.pipe(res);

                const responded = status;
                backendRes.on('end', () => finish({ kind: 'responded', status: responded }));
                backendRes.on('error', (err) => {
                    if (settled) return;
                    this.logger.warn({ err, service: target.name, requestId: ctx.requestId }, 'Backend response stream failed');
                    res.destroy();
                    finish({ kind: 'responded', status: responded });
                });
            });

            backendReq.on('socket', (socket: Socket) => {
                if (!socket.connecting) return; // reused from the pool
                cleanups.push(watchHandshake(socket, this.transport, error => backendReq.destroy(error)));
            });

            backendReq.on('timeout', () => {
                backendReq.destroy(new ForwardTimeoutError('response', target.timeoutMs));
            });

            backendReq.on('error', (err) => {
                if (settled) return;

                if (err instanceof BodyLimitExceededError && status === undefined) {
                    this.logger.warn({ service: target.name, limit: err.limit, requestId: ctx.requestId }, 'Request body too large');
                    finish({ kind: 'body-too-large', error: new ClientError(413, 'Request body too large') });
                    return;
                }

                if (status !== undefined) {
                    // Backend already answered; the body broke off mid-stream
                    this.logger.warn({ err, service: target.name, requestId: ctx.requestId }, 'Backend connection lost mid-response');
                    res.destroy();
                    finish({ kind: 'responded', status });
                    return;
                }

                this.logger.error({
                    err,
                    service: target.name,
                    target: `${target.url.origin}${path}`,
                    requestId: ctx.requestId,
                }, 'Proxy forwarding error');
                finish({ kind: 'transport-error', error: new BackendUnavailableError(target.name, 'transport', err) });
            });

            // Caller hung up: drop the backend call and give the socket back
            const onCallerGone = () => {
                if (settled || res.writableFinished) return;
                backendReq.destroy();
                finish(status === undefined ? { kind: 'aborted' } : { kind: 'responded', status });
            };
            res.on('close', onCallerGone);
            req.on('close', () => {
                if (!req.complete) onCallerGone();
            });

            body.on('error', err => backendReq.destroy(err));

            if (expectsContinue(req.headers.expect)) {
                let bodySent = false;
                const sendBody = () => {
                    if (bodySent) return;
                    bodySent = true;
                    req.pipe(body).pipe(backendReq);
                };
                backendReq.once('continue', sendBody);
                const continueTimer = setTimeout(sendBody, this.transport.expectContinueTimeoutMs);
                cleanups.push(() => clearTimeout(continueTimer));
            } else {
                req.pipe(body).pipe(backendReq);
            }
        });
    }

    /** Destroy every pooled socket. Used on shutdown. */
    close(): void {
        for (const resolution of this.targets.values()) {
            if (resolution.kind === 'ok') resolution.target.agent.destroy();
        }
    }

    private buildTarget(name: string, service: ServiceConfig): TargetResolution {
        let url: URL;
        try {
            url = new URL(service.url);
        } catch (err) {
            const error = new ConfigurationError(`Invalid URL for ${name}: ${service.url}`, err);
            this.logger.error({ service: name, url: service.url }, 'Invalid service URL');
            return { kind: 'misconfigured', error };
        }
        if (url.protocol !== 'http:' && url.protocol !== 'https:') {
            this.logger.error({ service: name, url: service.url }, 'Unsupported service URL protocol');
            return { kind: 'misconfigured', error: new ConfigurationError(`Unsupported protocol for ${name}: ${url.protocol}`) };
        }

        const agentOptions: http.AgentOptions = {
            keepAlive: true,
            maxFreeSockets: this.transport.maxIdleSocketsPerHost,
            timeout: this.transport.idleTimeoutMs,
            scheduling: 'lifo',
        };
        const agent = url.protocol === 'https:' ? new https.Agent(agentOptions) : new http.Agent(agentOptions);

        return {
            kind: 'ok',
            target: { name, url, timeoutMs: service.timeoutMs, circuitBreaker: service.circuitBreaker, agent },
        };
    }

    private outboundHeaders(ctx: GatewayContext, target: ServiceTarget): http.OutgoingHttpHeaders {
        const headers: http.OutgoingHttpHeaders = stripHopByHop(ctx.req.headers);

        headers.host = target.url.host;

        // Trace id: the caller's own if it sent one, otherwise ours
        headers[TRACE_HEADER] = ctx.requestId;

        // Identity header belongs to the gateway, never to the caller
        delete headers[IDENTITY_HEADER];
        if (ctx.identity) headers[IDENTITY_HEADER] = ctx.identity.subjectId;

        const peer = ctx.req.socket.remoteAddress;
        if (peer) {
            const prior = ctx.req.headers['x-forwarded-for'];
            headers['x-forwarded-for'] = prior ? `${prior}, ${peer}` : peer;
        }

        return headers;
    }
}

function stripHopByHop(headers: http.IncomingHttpHeaders): http.OutgoingHttpHeaders {
    const listed = new Set(
        String(headers.connection ?? '')
            .split(',')
            .map(token => token.trim().toLowerCase())
            .filter(Boolean),
    );

    const out: http.OutgoingHttpHeaders = {};
    for (const [name, value] of Object.entries(headers)) {
        if (value === undefined || HOP_BY_HOP.has(name) || listed.has(name)) continue;
        out[name] = value;
    }
    return out;
}

function callerGone(req: http.IncomingMessage, res: http.ServerResponse): boolean {
    return res.destroyed || res.closed || (req.destroyed && !req.complete);
}

function expectsContinue(expect: string | undefined): boolean {
    return expect !== undefined && expect.toLowerCase() === '100-continue';
}
