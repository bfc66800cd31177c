import { BackendUnavailableError } from '../errors';
import type { Forwarder } from '../proxy/forwarder';
import type { GatewayContext, GatewayMiddleware, NextFunction } from './types';

// =================================================================
// TARGET RESOLUTION
// =================================================================
// Looks up the route group's service before any breaker is asked.
//   unknown service → 503 Service not configured
//   bad base URL    → 500 Configuration error
// =================================================================

export class ResolveTargetMiddleware implements GatewayMiddleware {
    name = 'resolve-target';

    constructor(private forwarder: Forwarder) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const service = ctx.route.service;
        const resolution = this.forwarder.resolve(service);

        switch (resolution.kind) {
        case 'not-configured': {
            ctx.logger.error({ service }, 'Service configuration not found');
            const error = new BackendUnavailableError(service, 'not-configured');
            ctx.meta.stoppedBy = this.name;
            ctx.res.status(error.status).json(error.toResponseBody());
            return;
        }

        case 'misconfigured':
            ctx.logger.error({ service, err: resolution.error }, 'Service target misconfigured');
            ctx.meta.stoppedBy = this.name;
            ctx.res.status(resolution.error.status).json(resolution.error.toResponseBody());
            return;

        case 'ok':
            ctx.target = resolution.target;
            await next();
        }
    }
}
