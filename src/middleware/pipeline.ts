import { randomUUID } from 'node:crypto';
import type { Request, Response } from 'express';
import type { Logger } from 'pino';
import { TRACE_HEADER } from '../proxy/forwarder';
import type { RouteGroup } from '../routes';
import type { GatewayContext, GatewayMiddleware } from './types';

// =================================================================
// MIDDLEWARE PIPELINE
// =================================================================
//
// Chains middleware together in order. Each middleware calls next()
// to continue, or doesn't to stop.
//
//   pipeline.use(logger);        // always logs, even rejections
//   pipeline.use(cors);          // rejections still need CORS headers
//   pipeline.use(auth);          // 401
//   pipeline.use(rateLimit);     // 429
//   pipeline.use(resolveTarget); // 503/500 for unknown/broken target
//   pipeline.use(circuitBreak);  // 503
//   pipeline.use(proxy);         // the backend call
//
// One pipeline per route group, built once at start-up. A fresh
// GatewayContext is created per request and threaded through.
// =================================================================

export class MiddlewarePipeline {
    private middleware: GatewayMiddleware[] = [];

    constructor(
        private route: RouteGroup,
        private logger: Logger,
    ) {}

    use(mw: GatewayMiddleware): MiddlewarePipeline {
        this.middleware.push(mw);
        return this; // Chainable: pipeline.use(a).use(b).use(c)
    }

    async execute(req: Request, res: Response): Promise<void> {
        const inbound = req.get(TRACE_HEADER);
        const requestId = inbound !== undefined && inbound !== '' ? inbound : randomUUID();
        res.setHeader('X-Request-ID', requestId);

        const ctx: GatewayContext = {
            req,
            res,
            startTime: Date.now(),
            logger: this.logger.child({ requestId }),
            requestId,
            clientIp: req.ip ?? req.socket.remoteAddress ?? 'unknown',
            route: this.route,
            meta: {},
        };

        let index = 0;

        const next = async (): Promise<void> => {
            if (index >= this.middleware.length) return;

            const mw = this.middleware[index];
            index++;

            try {
                await mw.handle(ctx, next);
            } catch (err) {
                ctx.logger.error({ err, middleware: mw.name }, 'Middleware error');

                // A stage blew up between breaker and proxy: free the slot
                if (ctx.ticket && !ctx.ticket.settled) ctx.ticket.release();

                if (!res.headersSent) {
                    res.status(500).json({ error: 'Internal gateway error' });
                }
            }
        };

        await next();
    }

    getMiddlewareNames(): string[] {
        return this.middleware.map(m => m.name);
    }
}
