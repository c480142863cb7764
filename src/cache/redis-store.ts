import { createClient } from 'redis';
import { KeyValueStore } from './types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('RedisStore');

function createRedisClient(url: string) {
    return createClient({ url, disableOfflineQueue: true });
}

export type RedisClient = ReturnType<typeof createRedisClient>;

/**
 * Shared key-value store on Redis.
 *
 * Tag groups are kept as a Redis set of member keys under `tag:<name>`.
 * The set itself never expires; members that already expired are simply
 * absent when the group is invalidated.
 */
export class RedisStore implements KeyValueStore {
    constructor(private readonly client: RedisClient) { }

    public async get(key: string): Promise<string | null> {
        return this.client.get(key);
    }

    public async put(key: string, value: string, ttlSeconds: number, tag?: string): Promise<void> {
        await this.client.set(key, value, { EX: Math.max(1, Math.ceil(ttlSeconds)) });
        if (tag) {
            await this.client.sAdd(this.groupKey(tag), key);
        }
    }

    public async invalidateGroup(tag: string): Promise<number> {
        const groupKey = this.groupKey(tag);
        const members = await this.client.sMembers(groupKey);

        const removed = members.length > 0 ? await this.client.del(members) : 0;
        await this.client.del(groupKey);

        return removed;
    }

    private groupKey(tag: string): string {
        return `tag:${tag}`;
    }
}

/**
 * Build a client for `url` and start connecting in the background.
 *
 * The offline queue is disabled so that commands issued while Redis is
 * unreachable reject at once instead of piling up; the state store turns
 * those rejections into `cache:unavailable` notifications.
 */
export function createRedisStore(url: string): { store: RedisStore; client: RedisClient } {
    const client = createRedisClient(url);

    client.on('error', (error: Error) => {
        logger.error(`Redis client error: ${error.message}`);
    });

    void client.connect().catch((error: unknown) => {
        logger.error('Initial Redis connection failed', {
            error: error instanceof Error ? error.message : String(error),
        });
    });

    return { store: new RedisStore(client), client };
}
