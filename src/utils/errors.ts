/**
 * Root of all errors raised by the failover services.
 */
export class DbFailoverError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'DbFailoverError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** A configuration value is missing or invalid. */
export class ConfigurationError extends DbFailoverError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

/** A connection name was asked for that the host does not know about. */
export class UnknownConnectionError extends DbFailoverError {
    public readonly connectionName: string;

    constructor(connectionName: string, options?: ErrorOptions) {
        super(`Database connection '${connectionName}' is not configured`, options);
        this.name = 'UnknownConnectionError';
        this.connectionName = connectionName;
    }
}

/** A query did not settle within its time budget. */
export class QueryTimeoutError extends DbFailoverError {
    public readonly timeoutMs: number;

    constructor(timeoutMs: number, options?: ErrorOptions) {
        super(`Query timed out after ${timeoutMs}ms`, options);
        this.name = 'QueryTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Raised by the blocking stand-in connection for every query once the
 * application has been routed into limited functionality mode.
 */
export class AllDatabaseConnectionsUnavailableError extends DbFailoverError {
    constructor(
        message = 'All configured database connections (primary and failover) are currently unavailable. Application is in limited functionality mode.',
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'AllDatabaseConnectionsUnavailableError';
    }
}

/**
 * Normalize anything caught into an Error
 */
export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }
    return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
