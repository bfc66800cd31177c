// =================================================================
// LIMIT KEYS
// =================================================================
//
//   ratelimit:<scope>:<value>:<route>
//
//   ratelimit:ip:10.0.0.7:/api/auth
//   ratelimit:user:user-42:/api/transfers
//
// Same caller + same route → same key, every time.
// Different caller or different route → different key.
// The route is the route GROUP's pattern, not the concrete URL,
// so /api/users/1 and /api/users/2 share one quota.
// =================================================================

export type LimitScope = 'ip' | 'user';

export function limitKey(scope: LimitScope, value: string, route: string): string {
    return `ratelimit:${scope}:${value}:${route}`;
}
