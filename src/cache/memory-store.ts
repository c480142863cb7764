import { KeyValueStore } from './types.js';

interface StoreEntry {
    value: string;
    expiresAt: number;
    tag: string | null;
}

/**
 * In-process key-value store with per-entry TTL, LRU eviction and tag groups.
 *
 * Only shared within one process, so it suits single-instance hosts and
 * tests. Multi-instance deployments use the Redis store.
 * - Expired entries are dropped lazily on `get`.
 * - At capacity the least recently used entry is evicted.
 */
export class MemoryStore implements KeyValueStore {
    private readonly entries = new Map<string, StoreEntry>();
    private readonly groups = new Map<string, Set<string>>();

    constructor(private readonly maxEntries = 1000) {
        if (maxEntries < 1) {
            throw new RangeError('maxEntries must be at least 1');
        }
    }

    public async get(key: string): Promise<string | null> {
        const entry = this.entries.get(key);
        if (!entry) {
            return null;
        }

        if (Date.now() >= entry.expiresAt) {
            this.remove(key);
            return null;
        }

        // Promote to most recently used
        this.entries.delete(key);
        this.entries.set(key, entry);

        return entry.value;
    }

    public async put(key: string, value: string, ttlSeconds: number, tag?: string): Promise<void> {
        if (this.entries.has(key)) {
            this.remove(key);
        } else if (this.entries.size >= this.maxEntries) {
            const oldest = this.entries.keys().next();
            if (!oldest.done) {
                this.remove(oldest.value);
            }
        }

        this.entries.set(key, {
            value,
            expiresAt: Date.now() + ttlSeconds * 1000,
            tag: tag || null,
        });

        if (tag) {
            let members = this.groups.get(tag);
            if (!members) {
                members = new Set();
                this.groups.set(tag, members);
            }
            members.add(key);
        }
    }

    public async invalidateGroup(tag: string): Promise<number> {
        const members = this.groups.get(tag);
        if (!members) {
            return 0;
        }

        let removed = 0;
        for (const key of [...members]) {
            if (this.entries.has(key)) {
                removed++;
            }
            this.remove(key);
        }
        this.groups.delete(tag);

        return removed;
    }

    public get size(): number {
        return this.entries.size;
    }

    private remove(key: string): void {
        const entry = this.entries.get(key);
        if (!entry) return;

        this.entries.delete(key);
        if (entry.tag) {
            this.groups.get(entry.tag)?.delete(key);
        }
    }
}
