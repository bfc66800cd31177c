import { errors, jwtVerify } from 'jose';
import type { Logger } from 'pino';
import type { TokenVerification, TokenVerifier } from './types';

// =================================================================
// JWT VERIFIER — HMAC shared secret
// =================================================================
// Signature, `exp` and `nbf` are checked by jose. Only the listed
// HMAC algorithms are accepted, so a token signed with `none` or an
// asymmetric alg is rejected before the key is even used.
// =================================================================

export type HmacAlgorithm = 'HS256' | 'HS384' | 'HS512';

export class JwtTokenVerifier implements TokenVerifier {
    private key: Uint8Array;
    private logger: Logger;

    constructor(
        secret: string,
        private algorithms: HmacAlgorithm[],
        logger: Logger,
    ) {
        this.key = new TextEncoder().encode(secret);
        this.logger = logger.child({ component: 'jwt-verifier' });
    }

    async verify(token: string): Promise<TokenVerification> {
        try {
            const { payload } = await jwtVerify(token, this.key, { algorithms: this.algorithms });
            if (typeof payload.sub === 'string' && payload.sub !== '') {
                this.logger.debug({ userId: payload.sub }, 'Request authenticated');
                return { ok: true, identity: { subjectId: payload.sub, claims: payload } };
            }
            return { ok: true };
        } catch (err) {
            if (err instanceof errors.JWTExpired) {
                this.logger.warn({ reason: 'expired' }, 'Token validation failed');
                return { ok: false, reason: 'expired' };
            }
            if (err instanceof errors.JOSEError) {
                this.logger.warn({ reason: err.code }, 'Token validation failed');
                return { ok: false, reason: 'invalid' };
            }
            throw err;
        }
    }
}
