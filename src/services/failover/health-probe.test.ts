import { describe, it, expect, vi } from 'vitest';
import { HealthProbe } from './health-probe.js';
import { ConnectionResolver, DatabaseConnection } from './types.js';
import { PostgresConnection, PoolClientLike } from '../../database/postgres-connection.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
    createLogger: () => ({
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }),
}));

function fakeConnection(overrides: Partial<Pick<DatabaseConnection, 'run' | 'setQueryTimeout'>> = {}) {
    const connection = {
        name: 'primary',
        run: vi.fn<[string], Promise<void>>(overrides.run ?? (async () => undefined)),
        setQueryTimeout: vi.fn<[number | null], Promise<void>>(overrides.setQueryTimeout ?? (async () => undefined)),
        release: vi.fn((_destroy?: boolean) => undefined),
    };
    return connection;
}

/**
 * Client that runs its queries one after another, like a pg client.
 * `hangOn` never settles, so everything queued behind it waits forever.
 */
class SequentialClient implements PoolClientLike {
    public readonly queries: string[] = [];
    public readonly releases: Array<Error | boolean | undefined> = [];
    private tail: Promise<unknown> = Promise.resolve();

    constructor(private readonly hangOn: string) { }

    public query(text: string): Promise<unknown> {
        this.queries.push(text);
        const result = this.tail.then(() =>
            text === this.hangOn ? new Promise<never>(() => undefined) : { rows: [] }
        );
        this.tail = result.catch(() => undefined);
        return result;
    }

    public release(err?: Error | boolean): void {
        this.releases.push(err);
    }
}

function resolverFor(connection: DatabaseConnection): ConnectionResolver {
    return { resolve: async () => connection };
}

describe('HealthProbe', () => {
    const options = { query: 'SELECT 1', timeoutMs: 50 };

    it('should report healthy and restore the timeout', async () => {
        const connection = fakeConnection();
        const probe = new HealthProbe(resolverFor(connection), options);

        await expect(probe.isHealthy('primary')).resolves.toBe(true);

        expect(connection.setQueryTimeout.mock.calls).toEqual([[50], [null]]);
        expect(connection.run).toHaveBeenCalledWith('SELECT 1');
        expect(connection.release).toHaveBeenCalledWith(false);
    });

    it('should report unhealthy when the query fails', async () => {
        const connection = fakeConnection({
            run: async () => {
                throw new Error('connection refused');
            },
        });
        const probe = new HealthProbe(resolverFor(connection), options);

        await expect(probe.isHealthy('primary')).resolves.toBe(false);

        expect(connection.setQueryTimeout).toHaveBeenLastCalledWith(null);
        expect(connection.release).toHaveBeenCalledWith(false);
    });

    it('should report unhealthy when the connection cannot be resolved', async () => {
        const probe = new HealthProbe({
            resolve: async () => {
                throw new Error('no such database');
            },
        }, options);

        await expect(probe.isHealthy('missing')).resolves.toBe(false);
    });

    it('should give up on a hanging query and discard the client', async () => {
        const connection = fakeConnection({
            run: () => new Promise<void>(() => undefined),
        });
        const probe = new HealthProbe(resolverFor(connection), options);

        await expect(probe.isHealthy('primary')).resolves.toBe(false);

        expect(connection.release).toHaveBeenCalledWith(true);
    });

    it('should stay within one timeout budget when the query hangs', async () => {
        const client = new SequentialClient('SELECT 1');
        const probe = new HealthProbe(resolverFor(new PostgresConnection('primary', client)), {
            query: 'SELECT 1',
            timeoutMs: 200,
        });

        const startedAt = Date.now();
        await expect(probe.isHealthy('primary')).resolves.toBe(false);
        const elapsed = Date.now() - startedAt;

        expect(elapsed).toBeLessThan(300);
        expect(client.queries).toEqual(['SET statement_timeout = 200', 'SELECT 1']);
        expect(client.releases).toEqual([true]);
    });

    it('should reset the timeout on a healthy sequential client', async () => {
        const client = new SequentialClient('never');
        const probe = new HealthProbe(resolverFor(new PostgresConnection('primary', client)), options);

        await expect(probe.isHealthy('primary')).resolves.toBe(true);

        expect(client.queries).toEqual(['SET statement_timeout = 50', 'SELECT 1', 'RESET statement_timeout']);
        expect(client.releases).toEqual([false]);
    });

    it('should discard the client when the timeout cannot be restored', async () => {
        const connection = fakeConnection({
            setQueryTimeout: async (timeoutMs: number | null) => {
                if (timeoutMs === null) {
                    throw new Error('reset failed');
                }
            },
        });
        const probe = new HealthProbe(resolverFor(connection), options);

        await expect(probe.isHealthy('primary')).resolves.toBe(true);

        expect(connection.release).toHaveBeenCalledWith(true);
    });
});
