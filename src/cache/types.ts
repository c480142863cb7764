/**
 * Key-value store with per-key TTL, shared by every process that polls.
 *
 * Group invalidation is optional; callers must cope with stores that
 * cannot do it.
 */
export interface KeyValueStore {
    get(key: string): Promise<string | null>;
    put(key: string, value: string, ttlSeconds: number, tag?: string): Promise<void>;
    /** Remove every key written under `tag`, returning how many went */
    invalidateGroup?(tag: string): Promise<number>;
}
