import type { Logger } from 'pino';
import type { FailurePolicy } from '../config';
import type { CounterStore } from '../counter-store/types';
import { DependencyDegradedError } from '../errors';

// =================================================================
// TOKEN BLACKLIST
// =================================================================
// Revoked tokens live in the counting store as `blacklist:<token>`,
// expiring with the token's own remaining lifetime.
//
// Store down → `onStoreError` decides: 'allow' (default, same as the
// rate limiter) or 'deny' (503 until the store is back).
// =================================================================

export type BlacklistCheck =
    | { revoked: boolean }
    | { revoked: false; error: DependencyDegradedError; allowed: boolean };

export class TokenBlacklist {
    private logger: Logger;

    constructor(
        private store: CounterStore,
        private onStoreError: FailurePolicy,
        logger: Logger,
    ) {
        this.logger = logger.child({ component: 'token-blacklist' });
    }

    async check(token: string): Promise<BlacklistCheck> {
        try {
            return { revoked: await this.store.exists(blacklistKey(token)) };
        } catch (err) {
            this.logger.error({ err, policy: this.onStoreError }, 'Failed to check token blacklist');
            return {
                revoked: false,
                error: new DependencyDegradedError('token blacklist', err),
                allowed: this.onStoreError === 'allow',
            };
        }
    }

    async revoke(token: string, ttlMs: number): Promise<void> {
        await this.store.setWithExpiry(blacklistKey(token), 'revoked', ttlMs);
    }
}

export function blacklistKey(token: string): string {
    return `blacklist:${token}`;
}
