import type { TokenBlacklist } from '../auth/blacklist';
import type { TokenVerifier } from '../auth/types';
import { ClientError, type GatewayError } from '../errors';
import type { GatewayContext, GatewayMiddleware, NextFunction } from './types';

// =================================================================
// AUTH MIDDLEWARE
// =================================================================
// Authorization: Bearer <token>
//
//   no header        → 401 Missing authorization header
//   not "Bearer x"   → 401 Invalid authorization format
//   blacklisted      → 401 Token has been revoked
//   expired          → 401 Token has expired
//   bad sig/claims   → 401 Invalid token
//
// On success the Identity goes on the context for the limiter and
// the forwarder. Blacklist lookups that fail follow the blacklist's
// own failure policy.
// =================================================================

export class AuthMiddleware implements GatewayMiddleware {
    name = 'auth';

    constructor(
        private verifier: TokenVerifier,
        private blacklist?: TokenBlacklist,
    ) {}

    async handle(ctx: GatewayContext, next: NextFunction): Promise<void> {
        const header = ctx.req.get('authorization');
        if (header === undefined || header === '') {
            return this.reject(ctx, new ClientError(401, 'Missing authorization header'));
        }

        const parts = header.split(' ');
        if (parts.length !== 2 || parts[0] !== 'Bearer' || parts[1] === '') {
            return this.reject(ctx, new ClientError(401, 'Invalid authorization format'));
        }
        const token = parts[1];

        if (this.blacklist) {
            const check = await this.blacklist.check(token);
            if ('error' in check && !check.allowed) {
                return this.reject(ctx, check.error);
            }
            if (check.revoked) {
                return this.reject(ctx, new ClientError(401, 'Token has been revoked'));
            }
        }

        const verification = await this.verifier.verify(token);
        if (!verification.ok) {
            const message = verification.reason === 'expired' ? 'Token has expired' : 'Invalid token';
            return this.reject(ctx, new ClientError(401, message));
        }

        ctx.identity = verification.identity;
        await next();
    }

    private reject(ctx: GatewayContext, error: GatewayError): void {
        ctx.meta.stoppedBy = this.name;
        if (error.status === 401) ctx.res.setHeader('WWW-Authenticate', 'Bearer');
        ctx.res.status(error.status).json(error.toResponseBody());
    }
}
