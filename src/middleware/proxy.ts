import type { Forwarder } from '../proxy/forwarder';
import type { GatewayContext, GatewayMiddleware, NextFunction } from './types';

// =================================================================
// PROXY MIDDLEWARE — Final step in the pipeline
// =================================================================
// Forwards to the resolved target and settles the breaker ticket
// exactly once:
//   backend answered (any status) → report(true)
//   transport failure             → report(false) + 503
//   caller went away              → release()
//   body over the limit           → release() + 413
// =================================================================

export class ProxyMiddleware implements GatewayMiddleware {
    name = 'proxy';

    constructor(private forwarder: Forwarder) {}

    async handle(ctx: GatewayContext, _next: NextFunction): Promise<void> {
        const { res, target, ticket } = ctx;

        if (!target) {
            throw new Error(`No target resolved for ${ctx.route.service}`);
        }

        const outcome = await this.forwarder.send(ctx, target);

        switch (outcome.kind) {
        case 'responded':
            ticket?.report(true);
            break;

        case 'aborted':
            ticket?.release();
            ctx.logger.info({ service: target.name }, 'Client disconnected before backend responded');
            break;

        case 'body-too-large':
            ticket?.release();
            ctx.meta.stoppedBy = this.name;
            if (!res.headersSent) {
                res.status(outcome.error.status).json(outcome.error.toResponseBody());
            }
            break;

        case 'transport-error':
            ticket?.report(false);
            if (!res.headersSent) {
                res.status(outcome.error.status).json(outcome.error.toResponseBody());
            }
            break;
        }
    }
}
