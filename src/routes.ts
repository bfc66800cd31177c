import type { GatewayConfig } from './config';
import type { LimitScope } from './rate-limiters/keys';
import { createLimitPolicy, type LimitPolicy } from './rate-limiters/types';

// =================================================================
// ROUTE GROUPS — which checks guard which backend
// =================================================================
//
//   /api/auth       → auth-service         public, 5/min per IP
//   /api/transfers  → transaction-service  auth, 100/h per user
//   /api/users      → user-service         auth, 1000/h per user
//   /api/reporting  → reporting-service    auth, 1000/h per user
//   /api/aml        → aml-service          auth, 1000/h per user
//
// Every group is breaker-gated. The prefix comes from config.
// =================================================================

export interface RouteGroup {
    name: string;
    /** Mount path, e.g. /api/transfers. Also the rate limit route key. */
    path: string;
    service: string;
    requireAuth: boolean;
    limit?: { policy: LimitPolicy; scope: LimitScope };
    circuitBreaker: boolean;
}

export function buildRouteGroups(config: GatewayConfig): RouteGroup[] {
    const prefix = config.server.routePrefix.replace(/\/+$/, '');
    const { auth, transfers, default: standard } = config.rateLimit.policies;

    const authPolicy = createLimitPolicy(auth.quota, auth.windowMs);
    const transferPolicy = createLimitPolicy(transfers.quota, transfers.windowMs);
    const defaultPolicy = createLimitPolicy(standard.quota, standard.windowMs);

    const protectedGroup = (segment: string, service: string, policy: LimitPolicy): RouteGroup => ({
        name: segment,
        path: `${prefix}/${segment}`,
        service,
        requireAuth: true,
        limit: { policy, scope: 'user' },
        circuitBreaker: true,
    });

    return [
        {
            name: 'auth',
            path: `${prefix}/auth`,
            service: 'auth-service',
            requireAuth: false,
            limit: { policy: authPolicy, scope: 'ip' },
            circuitBreaker: true,
        },
        protectedGroup('transfers', 'transaction-service', transferPolicy),
        protectedGroup('users', 'user-service', defaultPolicy),
        protectedGroup('reporting', 'reporting-service', defaultPolicy),
        protectedGroup('aml', 'aml-service', defaultPolicy),
    ];
}
