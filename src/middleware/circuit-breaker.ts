import type { CircuitBreakerRegistry } from '../circuit-breaker/registry';
import { BackendUnavailableError } from '../errors';
import type { GatewayContext, GatewayMiddleware, NextFunction } from './types';

// =================================================================
// CIRCUIT BREAKER MIDDLEWARE
// =================================================================
// Asks the target's breaker for permission. Rejected → 503 with the
// logical service name and the backend is never contacted.
// Permitted → the ticket goes on the context; the proxy settles it.
// =================================================================

export class CircuitBreakerMiddleware implements GatewayMiddleware {
    name = 'circuit-breaker';

    constructor(private registry: CircuitBreakerRegistry) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        if (!ctx.route.circuitBreaker) {
            await next();
            return;
        }

        const service = ctx.target?.name ?? ctx.route.service;

        const permission = this.registry.attempt(service);

        if (!permission.permitted) {
            ctx.logger.warn({ service, state: this.registry.state(service), reason: permission.reason }, 'Circuit breaker open');
            const error = new BackendUnavailableError(service, permission.reason);
            ctx.meta.stoppedBy = this.name;
            ctx.res.status(error.status).json(error.toResponseBody());
            return;
        }

        ctx.ticket = permission.ticket;
        await next();
    }
}
