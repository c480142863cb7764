/**
 * Health status of a single connection as persisted in the state store
 */
export enum ConnectionStatus {
    /** Last probe succeeded */
    HEALTHY = 'HEALTHY',
    /** Failure threshold reached */
    DOWN = 'DOWN',
    /** Never probed, below threshold, or the store could not be read */
    UNKNOWN = 'UNKNOWN',
}

/**
 * Persisted unit of state, one per connection name.
 *
 * HEALTHY implies `consecutiveFailures === 0`; DOWN implies the count is
 * at or above the failure threshold.
 */
export interface ConnectionHealthRecord {
    connectionName: string;
    status: ConnectionStatus;
    consecutiveFailures: number;
}

/**
 * Names configured for the three distinguished roles
 */
export interface ConnectionRoles {
    primary: string;
    failover: string;
    blocking: string;
}

export type ConnectionRole = 'primary' | 'failover' | 'blocking' | 'other';

/**
 * Outcome of one coordinator pass. Derived, never persisted.
 */
export interface FailoverDecision {
    activeConnectionName: string;
    previousConnectionName: string | null;
    switched: boolean;
}

/**
 * A leased handle that can run one statement.
 *
 * `setQueryTimeout(null)` restores the handle's own default.
 */
export interface DatabaseConnection {
    readonly name: string;
    run(sql: string): Promise<void>;
    setQueryTimeout(timeoutMs: number | null): Promise<void>;
    release(destroy?: boolean): void;
}

/**
 * Resolves a connection name to a live handle (host contract)
 */
export interface ConnectionResolver {
    resolve(connectionName: string): Promise<DatabaseConnection>;
}

/**
 * Host connection manager the coordinator applies its decision to.
 * `setActiveConnection` is the one call allowed to throw out of the core.
 */
export interface ActiveConnectionSink {
    setActiveConnection(connectionName: string): void;
    getActiveConnection(): string;
}

export interface HealthProbeOptions {
    /** Liveness statement, e.g. `SELECT 1` */
    query: string;
    /** Budget for that single statement */
    timeoutMs: number;
}

export interface StateStoreOptions {
    roles: ConnectionRoles;
    failureThreshold: number;
    ttlSeconds: number;
    /** Key prefix in the shared store */
    prefix: string;
    /** Group tag used for bulk invalidation; empty disables it */
    tag: string;
}
