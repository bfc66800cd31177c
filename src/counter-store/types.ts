// =================================================================
// COUNTING STORE — the rate limiter's (and blacklist's) only state
// =================================================================
//
// An atomic counter service with expiry. The gateway never does
// read-modify-write itself: increment + "set expiry if the counter
// was just created" is ONE operation on the store side, so every
// gateway instance sharing the store sees the same window.
//
// Implementations throw on transport/store failure. Callers convert
// that into a DependencyDegradedError and apply their failure policy.
// =================================================================

export interface CounterStore {
    /** Store name for logs ("redis", "memory") */
    readonly name: string;

    /**
     * Increment `key` by one. If this call created the counter, set its
     * expiry to `windowMs` (rounded up to whole seconds, minimum 1s).
     * Returns the count after the increment.
     */
    incrementWithExpiry(key: string, windowMs: number): Promise<number>;

    /** Remaining time-to-live in ms, or null if the key is gone or has no expiry */
    ttl(key: string): Promise<number | null>;

    exists(key: string): Promise<boolean>;

    /** Plain set with expiry (token blacklisting) */
    setWithExpiry(key: string, value: string, ttlMs: number): Promise<void>;

    /** Liveness of the store itself */
    ping(): Promise<void>;
}

/** Window length in whole seconds, never below one. */
export function windowSeconds(windowMs: number): number {
    return Math.max(1, Math.ceil(windowMs / 1000));
}
