import type { GatewayContext, GatewayMiddleware, NextFunction } from './types';

// =================================================================
// CORS MIDDLEWARE
// =================================================================
// Adds CORS headers to ALL responses (even 401, 429, 503).
// Answers preflight OPTIONS itself, before any admission check.
// =================================================================

export const ALLOWED_METHODS = ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE'];

export class CorsMiddleware implements GatewayMiddleware {
    name = 'cors';

    constructor(
        private allowedOrigins: string[] = ['*'],
        private allowedMethods: string[] = ALLOWED_METHODS,
    ) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const { req, res } = ctx;
        const origin = req.headers.origin;

        const allowedOrigin = this.allowedOrigins.includes('*')
            ? '*'
            : origin !== undefined && this.allowedOrigins.includes(origin) ? origin : '';

        if (allowedOrigin) {
            res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
            res.setHeader('Access-Control-Allow-Methods', this.allowedMethods.join(', '));
            res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Request-ID');
            res.setHeader('Access-Control-Max-Age', '86400');
            if (allowedOrigin !== '*') res.setHeader('Vary', 'Origin');
        }

        // Preflight
        if (req.method === 'OPTIONS' && req.headers['access-control-request-method'] !== undefined) {
            ctx.meta.stoppedBy = this.name;
            res.status(204).end();
            return;
        }

        await next();
    }
}
