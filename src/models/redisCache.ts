import Redis from "ioredis";
import { KeyValueCache } from "./cache";

// KEYS[1] counter; ARGV amount, ceiling, ttl. Returns nil when the ceiling would be crossed.
const INCREMENT_WITHIN = `
local current = tonumber(redis.call("GET", KEYS[1]) or "0")
if current + tonumber(ARGV[1]) > tonumber(ARGV[2]) then
  return false
end
local total = redis.call("INCRBY", KEYS[1], ARGV[1])
redis.call("EXPIRE", KEYS[1], ARGV[3])
return total
`;

export function createRedisClient(url: string): Redis {
    return new Redis(url, {
        maxRetriesPerRequest: 3,
        lazyConnect: true
    });
}

export class RedisCache implements KeyValueCache {
    constructor(private readonly redis: Redis) {}

    async get(key: string): Promise<string | null> {
        return this.redis.get(key);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.redis.set(key, value, "EX", ttlSeconds);
    }

    async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
        const reply = await this.redis.set(key, value, "EX", ttlSeconds, "NX");
        return reply === "OK";
    }

    async incrementBy(key: string, amount: number, ttlSeconds: number): Promise<number> {
        const replies = await this.redis.multi().incrby(key, amount).expire(key, ttlSeconds).exec();
        const incr = replies?.[0];
        if (!incr) {
            throw new Error(`INCRBY ${key} was discarded`);
        }
        const [error, value] = incr;
        if (error) {
            throw error;
        }
        return Number(value);
    }

    async incrementWithin(key: string, amount: number, ceiling: number, ttlSeconds: number): Promise<number | null> {
        const reply = await this.redis.eval(INCREMENT_WITHIN, 1, key, amount, ceiling, ttlSeconds);
        return reply === null ? null : Number(reply);
    }

    async delete(key: string): Promise<void> {
        await this.redis.del(key);
    }

    async ping(): Promise<boolean> {
        try {
            return (await this.redis.ping()) === "PONG";
        } catch {
            return false;
        }
    }
}
