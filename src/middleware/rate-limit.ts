import { limitKey } from '../rate-limiters/keys';
import type { RateLimiter } from '../rate-limiters/types';
import type { GatewayContext, GatewayMiddleware, NextFunction } from './types';

// =================================================================
// RATE LIMIT MIDDLEWARE
// =================================================================
// Counts the request against the route group's policy. If exceeded,
// returns 429 and does NOT call next(); the backend never sees it.
//
// Key scope: the caller's identity when the group limits per user
// and auth produced one, otherwise the client IP.
// =================================================================

export class RateLimitMiddleware implements GatewayMiddleware {
    name = 'rate-limit';

    constructor(private limiter: RateLimiter) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { res, route } = ctx;
        if (!route.limit) {
            await next();
            return;
        }

        const key = route.limit.scope === 'user' && ctx.identity
            ? limitKey('user', ctx.identity.subjectId, route.path)
            : limitKey('ip', ctx.clientIp, route.path);

        const result = await this.limiter.consume(key, route.limit.policy);

        if (result.outcome === 'store-unavailable') {
            if (result.allowed) {
                await next();
                return;
            }
            ctx.meta.stoppedBy = this.name;
            res.status(result.error.status).json(result.error.toResponseBody());
            return;
        }

        // Headers on every counted request
        res.setHeader('X-RateLimit-Limit', result.limit);
        res.setHeader('X-RateLimit-Remaining', result.remaining);

        if (result.outcome === 'deny') {
            ctx.meta.stoppedBy = this.name;
            res.setHeader('Retry-After', result.retryAfter);
            res.status(429).json({
                error: 'Rate limit exceeded',
                retry_after: result.retryAfter,
            });
            return;
        }

        await next();
    }
}
