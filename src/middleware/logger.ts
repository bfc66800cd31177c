import type { GatewayContext, GatewayMiddleware, NextFunction } from './types';

// =================================================================
// LOGGER MIDDLEWARE
// =================================================================
// Runs first. Logs every request, even rejected ones, once the
// response is out, with timing and status.
// =================================================================

export class LoggerMiddleware implements GatewayMiddleware {
    name = 'logger';

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res, startTime } = ctx;

        res.on('finish', () => {
            ctx.logger.info({
                method: req.method,
                url: req.originalUrl,
                status: res.statusCode,
                service: ctx.route.service,
                upstreamStatus: ctx.meta.upstreamStatus,
                stoppedBy: ctx.meta.stoppedBy,
                latencyMs: Date.now() - startTime,
            }, 'request');
        });

        await next();
    }
}
