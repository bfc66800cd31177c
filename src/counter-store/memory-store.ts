import type { CounterStore } from './types';
import { windowSeconds } from './types';

// =================================================================
// IN-MEMORY COUNTING STORE
// =================================================================
//
// Single-process stand-in for Redis: same fixed-window semantics,
// no sharing across instances. Used when RATE_LIMIT_STORE=memory
// and by the tests.
//
//   key → { count, expiresAt }
//
// A key past expiresAt is treated as absent. Expired keys are swept
// when a new key arrives and the map has grown past the sweep mark;
// the mark then doubles from what survived, so sweeping stays
// amortized O(1) per new key. JavaScript runs each call to completion, so the
// increment + first-hit expiry below is atomic within the process.
// =================================================================

interface Entry {
    value: string | number;
    expiresAt: number;
}

export class MemoryCounterStore implements CounterStore {
    readonly name = 'memory';
    private entries: Map<string, Entry> = new Map();
    private nextSweepAt: number;

    constructor(
        private now: () => number = Date.now,
        private sweepThreshold = 1024,
    ) {
        this.nextSweepAt = sweepThreshold;
    }

    async incrementWithExpiry(key: string, windowMs: number): Promise<number> {
        const now = this.now();
        let entry = this.live(key, now);

        if (!entry) {
            this.maybeSweep(now);
            entry = { value: 0, expiresAt: now + windowSeconds(windowMs) * 1000 };
            this.entries.set(key, entry);
        }

        const count = (typeof entry.value === 'number' ? entry.value : Number(entry.value) || 0) + 1;
        entry.value = count;
        return count;
    }

    async ttl(key: string): Promise<number | null> {
        const now = this.now();
        const entry = this.live(key, now);
        if (!entry) return null;
        return entry.expiresAt - now;
    }

    async exists(key: string): Promise<boolean> {
        return this.live(key, this.now()) !== undefined;
    }

    async setWithExpiry(key: string, value: string, ttlMs: number): Promise<void> {
        const now = this.now();
        this.entries.set(key, { value, expiresAt: now + Math.max(1, Math.ceil(ttlMs)) });
    }

    async ping(): Promise<void> {}

    /** Number of keys currently held, expired or not. */
    size(): number {
        return this.entries.size;
    }

    private live(key: string, now: number): Entry | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (now >= entry.expiresAt) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }

    private maybeSweep(now: number): void {
        if (this.entries.size < this.nextSweepAt) return;
        this.cleanup(now);
        this.nextSweepAt = Math.max(this.sweepThreshold, this.entries.size * 2);
    }

    private cleanup(now: number): void {
        for (const [key, entry] of this.entries) {
            if (now >= entry.expiresAt) {
                this.entries.delete(key);
            }
        }
    }
}
