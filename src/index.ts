import { Redis } from 'ioredis';
import { createGateway } from './gateway';
import { loadConfig } from './config';
import { MemoryCounterStore } from './counter-store/memory-store';
import { RedisCounterStore } from './counter-store/redis-store';
import type { CounterStore } from './counter-store/types';
import { createLogger } from './logger';

// =================================================================
// Entry point: config → logger → store → gateway → listen
// =================================================================

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger({ level: config.server.logLevel, environment: config.server.environment });

    logger.info({ version: '1.0.0', environment: config.server.environment }, 'Initializing API gateway');

    let redis: Redis | undefined;
    let store: CounterStore;

    if (config.rateLimit.store === 'redis') {
        redis = new Redis(config.redis.url, {
            lazyConnect: true,
            enableOfflineQueue: false, // fail fast while disconnected, limiter fails open
            maxRetriesPerRequest: 1,
            commandTimeout: config.redis.commandTimeoutMs,
        });
        redis.on('error', (err: Error) => logger.warn({ err }, 'Redis connection error'));
        store = new RedisCounterStore(redis);

        try {
            await redis.connect();
            logger.info({ url: redactUrl(config.redis.url) }, 'Redis connection established');
        } catch (err) {
            logger.warn({ err }, 'Redis connection failed, rate limiting fails open until it recovers');
        }
    } else {
        logger.warn('Using in-memory rate limit store; quotas are per instance');
        store = new MemoryCounterStore();
    }

    const gateway = createGateway({ config, logger, store });

    const server = gateway.app.listen(config.server.port, () => {
        logger.info({ port: config.server.port, routes: gateway.routes.map(r => r.path) }, 'API gateway listening');
    });
    server.requestTimeout = config.server.requestTimeoutMs;
    server.keepAliveTimeout = config.server.keepAliveTimeoutMs;

    let shuttingDown = false;
    const shutdown = (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info({ signal }, 'Shutting down');
        logger.info({ circuitBreakers: gateway.breakers.stats() }, 'Circuit breaker statistics');

        server.close((err) => {
            if (err) logger.error({ err }, 'HTTP server close failed');
            gateway.close();
            const quit = redis ? redis.quit().then(() => undefined) : Promise.resolve();
            quit
                .catch((quitErr: unknown) => logger.error({ err: quitErr }, 'Redis quit failed'))
                .finally(() => logger.flush());
        });
        server.closeIdleConnections();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

function redactUrl(raw: string): string {
    try {
        const url = new URL(raw);
        if (url.password) url.password = '***';
        return url.toString();
    } catch {
        return '<invalid url>';
    }
}

main().catch((err: unknown) => {
    console.error('Server start failed', err);
    process.exitCode = 1;
});
