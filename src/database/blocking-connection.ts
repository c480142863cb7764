import { DatabaseConnection } from '../services/failover/types.js';
import { AllDatabaseConnectionsUnavailableError } from '../utils/errors.js';

/**
 * Inert stand-in used while both real connections are unavailable.
 *
 * Every statement fails fast with `AllDatabaseConnectionsUnavailableError`
 * instead of waiting on a dead socket. Timeout overrides and release are
 * no-ops since there is nothing underneath.
 */
export class BlockingConnection implements DatabaseConnection {
    public readonly driver = 'blocking';

    constructor(public readonly name: string) { }

    public async run(_sql: string): Promise<void> {
        throw new AllDatabaseConnectionsUnavailableError();
    }

    public async setQueryTimeout(_timeoutMs: number | null): Promise<void> { }

    public release(_destroy?: boolean): void { }
}
