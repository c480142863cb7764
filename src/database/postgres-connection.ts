import { DatabaseConnection } from '../services/failover/types.js';

/**
 * The part of a `pg` pool client the lease needs
 */
export interface PoolClientLike {
    query(text: string): Promise<unknown>;
    release(err?: Error | boolean): void;
}

/**
 * A pooled Postgres client leased for one unit of work.
 *
 * The timeout override is session-level (`SET statement_timeout`), so it
 * has to be reset before the client goes back to the pool.
 */
export class PostgresConnection implements DatabaseConnection {
    public readonly driver = 'postgres';
    private released = false;

    constructor(
        public readonly name: string,
        private readonly client: PoolClientLike
    ) { }

    public async run(sql: string): Promise<void> {
        await this.client.query(sql);
    }

    public async setQueryTimeout(timeoutMs: number | null): Promise<void> {
        if (timeoutMs === null) {
            await this.client.query('RESET statement_timeout');
            return;
        }
        await this.client.query(`SET statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`);
    }

    /**
     * Hand the client back; `destroy` closes it instead of re-pooling it
     */
    public release(destroy = false): void {
        if (this.released) return;
        this.released = true;
        this.client.release(destroy);
    }
}
