import { ClientError } from '../errors';
import type { GatewayContext, GatewayMiddleware, NextFunction } from './types';

// =================================================================
// BODY LIMIT MIDDLEWARE
// =================================================================
// Rejects a request whose declared Content-Length is over the limit
// with 413, before auth or rate limiting spend anything on it.
//
// Chunked bodies declare no length; the forwarder counts those bytes
// while streaming and stops at the same limit.
// =================================================================

export class BodyLimitMiddleware implements GatewayMiddleware {
    name = 'body-limit';

    constructor(private maxBytes: number) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const declared = ctx.req.headers['content-length'];

        if (declared !== undefined && Number(declared) > this.maxBytes) {
            const error = new ClientError(413, 'Request body too large');
            ctx.meta.stoppedBy = this.name;
            ctx.res.setHeader('Connection', 'close');
            ctx.res.status(error.status).json(error.toResponseBody());
            return;
        }

        await next();
    }
}
