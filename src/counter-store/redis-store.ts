import type { Redis } from 'ioredis';
import type { CounterStore } from './types';
import { windowSeconds } from './types';

// =================================================================
// REDIS COUNTING STORE
// =================================================================
//
// INCR and the first-hit EXPIRE run inside one Lua script, so the
// pair is atomic on the Redis side:
//
//   current = INCR key
//   if current == 1 → EXPIRE key window   (window just started)
//   return current
//
// Later increments never touch the expiry, which is what makes the
// window FIXED: it resets when the key expires, not on every hit.
// =================================================================

const INCREMENT_WITH_EXPIRY = `
local current = redis.call("INCR", KEYS[1])
if current == 1 then
    redis.call("EXPIRE", KEYS[1], ARGV[1])
end
return current
`;

export class RedisCounterStore implements CounterStore {
    readonly name = 'redis';

    constructor(private client: Redis) {}

    async incrementWithExpiry(key: string, windowMs: number): Promise<number> {
        const result = await this.client.eval(INCREMENT_WITH_EXPIRY, 1, key, windowSeconds(windowMs));
        if (typeof result !== 'number') {
            throw new Error(`Unexpected reply from increment script: ${String(result)}`);
        }
        return result;
    }

    async ttl(key: string): Promise<number | null> {
        // -2: no such key, -1: key without expiry
        const ms = await this.client.pttl(key);
        return ms >= 0 ? ms : null;
    }

    async exists(key: string): Promise<boolean> {
        return (await this.client.exists(key)) > 0;
    }

    async setWithExpiry(key: string, value: string, ttlMs: number): Promise<void> {
        await this.client.set(key, value, 'PX', Math.max(1, Math.ceil(ttlMs)));
    }

    async ping(): Promise<void> {
        await this.client.ping();
    }
}
