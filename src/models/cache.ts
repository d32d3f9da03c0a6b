// Ephemeral shared state for the deposit guard. Losing it weakens fraud protection only.

export interface KeyValueCache {
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlSeconds: number): Promise<void>;
    /** Atomically stores the value only when the key is absent; true when it was stored. */
    setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
    /** Atomically adds `amount` (an integer, possibly negative) and refreshes the TTL. */
    incrementBy(key: string, amount: number, ttlSeconds: number): Promise<number>;
    /**
     * Atomically adds `amount` only when the result stays at or under `ceiling`.
     * Returns the new total, or null when the counter was left untouched.
     */
    incrementWithin(key: string, amount: number, ceiling: number, ttlSeconds: number): Promise<number | null>;
    delete(key: string): Promise<void>;
    ping(): Promise<boolean>;
}

interface Entry {
    value: string;
    expiresAt: number;
}

export class MemoryCache implements KeyValueCache {
    private entries: Map<string, Entry> = new Map();

    constructor(private readonly now: () => number = Date.now) {}

    private live(key: string): Entry | undefined {
        const entry = this.entries.get(key);
        if (entry && entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }

    async get(key: string): Promise<string | null> {
        return this.live(key)?.value ?? null;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    }

    async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
        if (this.live(key)) {
            return false;
        }
        await this.set(key, value, ttlSeconds);
        return true;
    }

    async incrementBy(key: string, amount: number, ttlSeconds: number): Promise<number> {
        const current = Number(this.live(key)?.value ?? 0);
        const next = current + amount;
        await this.set(key, String(next), ttlSeconds);
        return next;
    }

    async incrementWithin(key: string, amount: number, ceiling: number, ttlSeconds: number): Promise<number | null> {
        const current = Number(this.live(key)?.value ?? 0);
        if (current + amount > ceiling) {
            return null;
        }
        return this.incrementBy(key, amount, ttlSeconds);
    }

    async delete(key: string): Promise<void> {
        this.entries.delete(key);
    }

    async ping(): Promise<boolean> {
        return true;
    }

    clear() {
        this.entries.clear();
    }
}
