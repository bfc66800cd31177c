import express, { type NextFunction, type Request, type Response } from 'express';
import type { Logger } from 'pino';
import { JwtTokenVerifier } from './auth/jwt-verifier';
import { TokenBlacklist } from './auth/blacklist';
import type { TokenVerifier } from './auth/types';
import { CircuitBreakerRegistry } from './circuit-breaker/registry';
import type { GatewayConfig } from './config';
import type { CounterStore } from './counter-store/types';
import { AuthMiddleware } from './middleware/auth';
import { BodyLimitMiddleware } from './middleware/body-limit';
import { CircuitBreakerMiddleware } from './middleware/circuit-breaker';
import { CorsMiddleware } from './middleware/cors';
import { LoggerMiddleware } from './middleware/logger';
import { MiddlewarePipeline } from './middleware/pipeline';
import { ProxyMiddleware } from './middleware/proxy';
import { RateLimitMiddleware } from './middleware/rate-limit';
import { secureHeaders } from './middleware/secure-headers';
import { ResolveTargetMiddleware } from './middleware/target';
import { Forwarder } from './proxy/forwarder';
import { FixedWindowRateLimiter } from './rate-limiters/fixed-window';
import { buildRouteGroups, type RouteGroup } from './routes';

// =================================================================
// API GATEWAY — AUTH + RATE LIMIT + CIRCUIT BREAKER + PROXY
// =================================================================
//
//   GET /health          → liveness, outside every pipeline
//   GET /health/circuits → breaker stats per service
//   GET /ready           → 200 while the counting store answers
//   /api/<group>/...     → that group's pipeline
//   anything else        → 404
//
// Everything with state (breakers, socket pools) is built here once
// and shared by all requests. The counting store is passed in so the
// caller decides Redis vs memory.
// =================================================================

export interface GatewayDeps {
    config: GatewayConfig;
    logger: Logger;
    store: CounterStore;
    /** Defaults to HMAC JWT verification with config.security */
    verifier?: TokenVerifier;
    /** Clock for the breakers */
    now?: () => number;
}

export interface Gateway {
    app: express.Express;
    routes: RouteGroup[];
    breakers: CircuitBreakerRegistry;
    forwarder: Forwarder;
    blacklist: TokenBlacklist;
    /** Release pooled backend sockets */
    close(): void;
}

export function createGateway({ config, logger, store, verifier, now }: GatewayDeps): Gateway {
    const app = express();
    app.disable('x-powered-by');
    app.set('trust proxy', config.server.trustProxy);

    const routes = buildRouteGroups(config);

    const breakers = new CircuitBreakerRegistry(
        Object.entries(config.services).map(([name, service]) => ({ name, circuitBreaker: service.circuitBreaker })),
        config.breaker,
        logger,
        now,
    );
    const forwarder = new Forwarder(
        config.services,
        { ...config.transport, maxBodyBytes: config.server.bodyLimitBytes },
        config.server.routePrefix,
        logger,
    );
    const limiter = new FixedWindowRateLimiter(store, { onStoreError: config.rateLimit.onStoreError, logger });
    const blacklist = new TokenBlacklist(store, config.security.onBlacklistError, logger);
    const auth = new AuthMiddleware(
        verifier ?? new JwtTokenVerifier(config.security.jwtSecret, config.security.algorithms, logger),
        blacklist,
    );

    const requestLogger = new LoggerMiddleware();
    const cors = new CorsMiddleware(config.cors.allowOrigins);
    const bodyLimit = new BodyLimitMiddleware(config.server.bodyLimitBytes);
    const rateLimit = new RateLimitMiddleware(limiter);
    const resolveTarget = new ResolveTargetMiddleware(forwarder);
    const circuitBreak = new CircuitBreakerMiddleware(breakers);
    const proxy = new ProxyMiddleware(forwarder);

    app.use(secureHeaders());

    // ── Health ──────────────────────────────────────────────────
    app.get('/health', (_req, res) => {
        res.json({ status: 'UP' });
    });

    app.get('/health/circuits', (_req, res) => {
        res.json({ circuitBreakers: breakers.stats() });
    });

    app.get('/ready', async (_req, res) => {
        try {
            await store.ping();
            res.json({ status: 'READY', store: store.name });
        } catch (err) {
            logger.warn({ err, store: store.name }, 'Readiness check failed');
            res.status(503).json({ status: 'NOT_READY', store: store.name });
        }
    });

    // ── Route groups ────────────────────────────────────────────
    for (const route of routes) {
        const pipeline = new MiddlewarePipeline(route, logger.child({ component: 'pipeline', route: route.name }));
        pipeline.use(requestLogger).use(cors).use(bodyLimit);
        if (route.requireAuth) pipeline.use(auth);
        pipeline.use(rateLimit).use(resolveTarget).use(circuitBreak).use(proxy);

        app.use(route.path, (req: Request, res: Response) => pipeline.execute(req, res));
        logger.debug({ route: route.path, service: route.service, stages: pipeline.getMiddlewareNames() }, 'Route registered');
    }

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'Not found' });
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        logger.error({ err }, 'Unhandled gateway error');
        if (!res.headersSent) {
            res.status(500).json({ error: 'Internal gateway error' });
        }
    });

    return {
        app,
        routes,
        breakers,
        forwarder,
        blacklist,
        close: () => forwarder.close(),
    };
}
