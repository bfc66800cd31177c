import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

// =================================================================
// CONFIGURATION
// =================================================================
//
// Loaded once at start-up, read-only afterwards.
//
//   1. .env                 → process.env (dotenv)
//   2. config/gateway.json  → services, policies, CORS (optional file)
//   3. env overrides        → PORT, REDIS_URL, JWT_SECRET, ...
//   4. zod                  → defaults + validation
//
// All durations are milliseconds.
// =================================================================

const failurePolicy = z.enum(['allow', 'deny']);

const limitPolicy = z.object({
    quota: z.number().int().positive(),
    windowMs: z.number().int().positive(),
});

const serviceTarget = z.object({
    url: z.string().min(1),
    timeoutMs: z.number().int().positive().default(30_000),
    circuitBreaker: z.boolean().default(true),
});

export const configSchema = z.object({
    server: z.object({
        port: z.coerce.number().int().min(0).max(65535).default(8080),
        environment: z.string().default('production'),
        routePrefix: z.string().startsWith('/').default('/api'),
        trustProxy: z.boolean().default(false),
        requestTimeoutMs: z.number().int().positive().default(10_000),
        keepAliveTimeoutMs: z.number().int().positive().default(120_000),
        bodyLimitBytes: z.number().int().positive().default(2 * 1024 * 1024),
        logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    }).default({}),
    redis: z.object({
        url: z.string().default('redis://localhost:6379'),
        commandTimeoutMs: z.number().int().positive().default(500),
    }).default({}),
    rateLimit: z.object({
        store: z.enum(['redis', 'memory']).default('redis'),
        onStoreError: failurePolicy.default('allow'),
        policies: z.object({
            auth: limitPolicy.default({ quota: 5, windowMs: 60_000 }),
            transfers: limitPolicy.default({ quota: 100, windowMs: 3_600_000 }),
            default: limitPolicy.default({ quota: 1000, windowMs: 3_600_000 }),
        }).default({}),
    }).default({}),
    security: z.object({
        jwtSecret: z.string().min(16, 'JWT secret must be at least 16 characters'),
        algorithms: z.array(z.enum(['HS256', 'HS384', 'HS512'])).nonempty().default(['HS256']),
        onBlacklistError: failurePolicy.default('allow'),
    }),
    breaker: z.object({
        failureThreshold: z.number().int().positive().default(5),
        openTimeoutMs: z.number().int().positive().default(30_000),
        halfOpenMaxProbes: z.number().int().positive().default(5),
        intervalMs: z.number().int().nonnegative().default(10_000),
    }).default({}),
    transport: z.object({
        maxIdleSocketsPerHost: z.number().int().positive().default(100),
        idleTimeoutMs: z.number().int().positive().default(90_000),
        connectTimeoutMs: z.number().int().positive().default(10_000),
        tlsHandshakeTimeoutMs: z.number().int().positive().default(10_000),
        expectContinueTimeoutMs: z.number().int().positive().default(1_000),
    }).default({}),
    services: z.record(z.string(), serviceTarget).default({}),
    cors: z.object({
        allowOrigins: z.array(z.string()).default(['*']),
    }).default({}),
});

export type GatewayConfig = z.infer<typeof configSchema>;
export type FailurePolicy = z.infer<typeof failurePolicy>;
export type ServiceConfig = z.infer<typeof serviceTarget>;

export type Env = Record<string, string | undefined>;

/**
 * Validate a raw config object. Throws ConfigurationError listing every
 * zod issue as `path: message`.
 */
export function parseConfig(raw: unknown): GatewayConfig {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid gateway configuration: ${issues}`, result.error);
    }
    return result.data;
}

function readConfigFile(file: string, required: boolean): Record<string, unknown> {
    if (!fs.existsSync(file)) {
        if (required) throw new ConfigurationError(`Config file not found: ${file}`);
        return {};
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err) {
        throw new ConfigurationError(`Config file ${file} is not valid JSON`, err);
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ConfigurationError(`Config file ${file} must contain a JSON object`);
    }
    return Object.fromEntries(Object.entries(parsed));
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = raw[key];
    return typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

function setIfPresent(target: Record<string, unknown>, key: string, value: string | undefined): void {
    if (value !== undefined && value !== '') target[key] = value;
}

/**
 * Merge a parsed config file with environment overrides. Pure, so it can be
 * tested without touching process.env or the filesystem.
 */
export function mergeEnv(fileConfig: Record<string, unknown>, env: Env): Record<string, unknown> {
    const server = section(fileConfig, 'server');
    setIfPresent(server, 'port', env.PORT);
    setIfPresent(server, 'environment', env.NODE_ENV);
    setIfPresent(server, 'logLevel', env.LOG_LEVEL);
    setIfPresent(server, 'routePrefix', env.ROUTE_PREFIX);

    const redis = section(fileConfig, 'redis');
    setIfPresent(redis, 'url', env.REDIS_URL);

    const rateLimit = section(fileConfig, 'rateLimit');
    setIfPresent(rateLimit, 'store', env.RATE_LIMIT_STORE);

    const security = section(fileConfig, 'security');
    setIfPresent(security, 'jwtSecret', env.JWT_SECRET);

    return { ...fileConfig, server, redis, rateLimit, security };
}

/**
 * Load .env, the JSON config file and env overrides, then validate.
 * GATEWAY_CONFIG names the file; when it is set the file must exist.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): GatewayConfig {
    dotenv.config({ path: path.resolve(cwd, '.env') });

    const explicit = env.GATEWAY_CONFIG;
    const file = path.resolve(cwd, explicit ?? 'config/gateway.json');
    const fileConfig = readConfigFile(file, explicit !== undefined);

    return parseConfig(mergeEnv(fileConfig, env));
}
