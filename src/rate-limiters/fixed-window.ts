import type { Logger } from 'pino';
import type { FailurePolicy } from '../config';
import type { CounterStore } from '../counter-store/types';
import { windowSeconds } from '../counter-store/types';
import { DependencyDegradedError } from '../errors';
import type { LimitPolicy, RateLimitResult, RateLimiter } from './types';

// =================================================================
// FIXED WINDOW RATE LIMITER
// =================================================================
//
// HOW IT WORKS:
//   Count requests per key. The first hit of a window creates the
//   counter with an expiry of `windowMs`; when it expires the next
//   hit starts a fresh window.
//
//   quota = 5, window = 60s
//   hit 1 → count 1 (expiry set) → allow, remaining 4
//   hit 5 → count 5              → allow, remaining 0
//   hit 6 → count 6              → deny, Retry-After = TTL left
//
// The counter lives in a CounterStore, not in this process, so a
// fleet of gateways shares one quota per key.
//
// FAILURE POLICY:
//   Store down → `onStoreError` decides. Default 'allow': the
//   business system stays up and quota enforcement is skipped for
//   that request. The error is logged, never shown to the caller.
// =================================================================

export interface FixedWindowOptions {
    onStoreError: FailurePolicy;
    logger: Logger;
}

export class FixedWindowRateLimiter implements RateLimiter {
    name = 'fixed-window';
    private logger: Logger;

    constructor(
        private store: CounterStore,
        private options: FixedWindowOptions,
    ) {
        this.logger = options.logger.child({ component: 'rate-limiter' });
    }

    async consume(key: string, policy: LimitPolicy): Promise<RateLimitResult> {
        let count: number;
        try {
            count = await this.store.incrementWithExpiry(key, policy.windowMs);
        } catch (err) {
            const error = new DependencyDegradedError(`counting store (${this.store.name})`, err);
            this.logger.error({ err, key, policy: this.options.onStoreError }, 'Rate limiter store error');
            return {
                outcome: 'store-unavailable',
                allowed: this.options.onStoreError === 'allow',
                limit: policy.quota,
                error,
            };
        }

        if (count > policy.quota) {
            const retryAfter = await this.retryAfter(key, policy);
            this.logger.warn({ key, count, limit: policy.quota }, 'Rate limit exceeded');
            return {
                outcome: 'deny',
                allowed: false,
                limit: policy.quota,
                remaining: 0,
                retryAfter,
            };
        }

        return {
            outcome: 'allow',
            allowed: true,
            limit: policy.quota,
            remaining: Math.max(0, policy.quota - count),
        };
    }

    /**
     * Seconds until the window resets. If the TTL is unknown (expired
     * between INCR and lookup, or the lookup failed) use the full window.
     */
    private async retryAfter(key: string, policy: LimitPolicy): Promise<number> {
        let ttlMs: number | null = null;
        try {
            ttlMs = await this.store.ttl(key);
        } catch (err) {
            this.logger.error({ err, key }, 'Rate limiter TTL lookup failed');
        }

        const seconds = ttlMs === null ? 0 : Math.ceil(ttlMs / 1000);
        return seconds > 0 ? seconds : windowSeconds(policy.windowMs);
    }
}
