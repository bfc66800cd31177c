import { ConfigurationError, type DependencyDegradedError } from '../errors';

// =================================================================
// Rate limiter types
// =================================================================

/** Quota per window. One per route class, never mutated. */
export interface LimitPolicy {
    readonly quota: number;
    readonly windowMs: number;
}

export function createLimitPolicy(quota: number, windowMs: number): LimitPolicy {
    if (!Number.isInteger(quota) || quota <= 0) {
        throw new ConfigurationError(`Rate limit quota must be a positive integer, got ${quota}`);
    }
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
        throw new ConfigurationError(`Rate limit window must be positive, got ${windowMs}ms`);
    }
    return Object.freeze({ quota, windowMs });
}

export type RateLimitResult =
    | { outcome: 'allow'; allowed: true; limit: number; remaining: number }
    | { outcome: 'deny'; allowed: false; limit: number; remaining: 0; retryAfter: number }
    /** Store unreachable; `allowed` follows the limiter's failure policy */
    | { outcome: 'store-unavailable'; allowed: boolean; limit: number; error: DependencyDegradedError };

export interface RateLimiter {
    /** Count one request against `key` and decide */
    consume(key: string, policy: LimitPolicy): Promise<RateLimitResult>;

    /** Algorithm name (for logs) */
    name: string;
}
