import pg from 'pg';
import { BlockingConnection } from './blocking-connection.js';
import { PoolClientLike, PostgresConnection } from './postgres-connection.js';
import { DatabaseConfig } from '../config/schema.js';
import {
    ActiveConnectionSink,
    ConnectionResolver,
    DatabaseConnection,
} from '../services/failover/types.js';
import { UnknownConnectionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('DatabaseManager');

/**
 * The part of a `pg` pool the manager needs
 */
export interface PoolLike {
    connect(): Promise<PoolClientLike>;
    end(): Promise<void>;
}

export type PostgresDatabaseConfig = Extract<DatabaseConfig, { driver: 'postgres' }>;

export type PoolFactory = (name: string, config: PostgresDatabaseConfig) => PoolLike;

const createPgPool: PoolFactory = (name, config) => {
    const pool = new pg.Pool({
        connectionString: config.url,
        max: config.maxPoolSize,
        connectionTimeoutMillis: config.connectionTimeoutMs,
        application_name: `db-failover:${name}`,
    });

    pool.on('error', (error: Error) => {
        logger.error(`Idle client error on '${name}': ${error.message}`);
    });

    return pool;
};

/**
 * Database Manager: the host's named connections and its active default
 *
 * - Lazily creates one `pg` pool per configured Postgres database
 * - Always serves the blocking role name with a `BlockingConnection`
 * - Holds the active connection name the coordinator switches
 */
export class DatabaseManager implements ConnectionResolver, ActiveConnectionSink {
    private readonly pools = new Map<string, PoolLike>();
    private activeConnectionName: string;

    constructor(
        private readonly databases: Record<string, DatabaseConfig>,
        defaultConnectionName: string,
        private readonly blockingConnectionName: string,
        private readonly poolFactory: PoolFactory = createPgPool
    ) {
        this.activeConnectionName = defaultConnectionName;
    }

    /**
     * Lease a handle on `connectionName`
     */
    public async resolve(connectionName: string): Promise<DatabaseConnection> {
        if (connectionName === this.blockingConnectionName) {
            return new BlockingConnection(connectionName);
        }

        const config = this.databases[connectionName];
        if (!this.hasConnection(connectionName) || !config) {
            throw new UnknownConnectionError(connectionName);
        }
        if (config.driver === 'blocking') {
            return new BlockingConnection(connectionName);
        }

        const client = await this.poolFor(connectionName, config).connect();
        return new PostgresConnection(connectionName, client);
    }

    public setActiveConnection(connectionName: string): void {
        if (!this.hasConnection(connectionName)) {
            throw new UnknownConnectionError(connectionName);
        }

        logger.info(`Default connection set to '${connectionName}'`);
        this.activeConnectionName = connectionName;
    }

    public getActiveConnection(): string {
        return this.activeConnectionName;
    }

    public hasConnection(connectionName: string): boolean {
        return connectionName === this.blockingConnectionName
            || Object.prototype.hasOwnProperty.call(this.databases, connectionName);
    }

    /**
     * Lease the active (or named) connection for the duration of `work`
     */
    public async withConnection<T>(
        work: (connection: DatabaseConnection) => Promise<T>,
        connectionName: string = this.activeConnectionName
    ): Promise<T> {
        const connection = await this.resolve(connectionName);
        let failed = false;
        try {
            return await work(connection);
        } catch (error) {
            failed = true;
            throw error;
        } finally {
            connection.release(failed);
        }
    }

    /**
     * End every pool that was opened
     */
    public async close(): Promise<void> {
        const pools = [...this.pools.entries()];
        this.pools.clear();

        const results = await Promise.allSettled(pools.map(([, pool]) => pool.end()));
        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                logger.warn(`Failed to close pool '${pools[index][0]}': ${String(result.reason)}`);
            }
        });
    }

    private poolFor(connectionName: string, config: PostgresDatabaseConfig): PoolLike {
        let pool = this.pools.get(connectionName);
        if (!pool) {
            pool = this.poolFactory(connectionName, config);
            this.pools.set(connectionName, pool);
        }
        return pool;
    }
}
