import { ConnectionStatus } from '../failover/types.js';

/**
 * Outcome of one connection check
 */
export interface HealthCheckResult {
    connectionName: string;
    status: ConnectionStatus;
    failureCount: number;
}

/**
 * Report returned by a manual or scheduled run
 */
export interface HealthCheckReport {
    success: boolean;
    connections: string[];
    results: HealthCheckResult[];
    /** Set when the run was rejected before probing anything */
    error?: string;
}

export interface HealthCheckRunOptions {
    /** Check only this connection; defaults to primary and failover */
    connectionName?: string;
    /** Override the configured lifecycle-event setting for this run */
    dispatchEvents?: boolean;
}

/**
 * Lookup the runner uses to reject names the host does not know
 */
export interface ConnectionCatalog {
    hasConnection(connectionName: string): boolean;
}
