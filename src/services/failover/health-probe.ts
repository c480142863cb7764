import { ConnectionResolver, DatabaseConnection, HealthProbeOptions } from './types.js';
import { withTimeout } from '../../utils/async.js';
import { QueryTimeoutError, toError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('HealthProbe');

/**
 * Health Probe: one bounded liveness check against a named connection
 *
 * - Resolves the connection through the host resolver
 * - Narrows the statement timeout for the liveness query only
 * - Restores the timeout afterwards unless the handle is being discarded
 * - Overall time is bounded by `timeoutMs`
 * - Never throws: every failure mode reads as "unhealthy"
 */
export class HealthProbe {
    constructor(
        private readonly resolver: ConnectionResolver,
        private readonly options: HealthProbeOptions
    ) { }

    /**
     * Run the liveness query against `connectionName`
     */
    public async isHealthy(connectionName: string): Promise<boolean> {
        let connection: DatabaseConnection;
        try {
            connection = await this.resolver.resolve(connectionName);
        } catch (error) {
            logger.warn(`Health check for '${connectionName}' failed: could not resolve connection: ${toError(error).message}`);
            return false;
        }

        // One budget covers the timeout override and the liveness query
        const deadline = Date.now() + this.options.timeoutMs;
        let healthy = false;
        let discard = false;

        try {
            await this.bounded(connection.setQueryTimeout(this.options.timeoutMs), deadline);
            await this.bounded(connection.run(this.options.query), deadline);
            healthy = true;
            logger.debug(`Health check for '${connectionName}' passed`);
        } catch (error) {
            discard = error instanceof QueryTimeoutError;
            logger.warn(`Health check for '${connectionName}' failed: ${toError(error).message}`, {
                connection: connectionName,
                reason: toError(error).name,
            });
        } finally {
            // A discarded handle takes its session settings with it
            if (!discard) {
                discard = !(await this.restoreTimeout(connection, deadline));
            }
            connection.release(discard);
        }

        return healthy;
    }

    /**
     * Put the handle's default timeout back. A handle that cannot be
     * restored is reported so the caller discards it instead of pooling it.
     */
    private async restoreTimeout(connection: DatabaseConnection, deadline: number): Promise<boolean> {
        try {
            await this.bounded(connection.setQueryTimeout(null), deadline);
            return true;
        } catch (error) {
            logger.debug(`Could not restore query timeout on '${connection.name}': ${toError(error).message}`);
            return false;
        }
    }

    private bounded<T>(operation: Promise<T>, deadline: number): Promise<T> {
        const remainingMs = Math.max(0, deadline - Date.now());
        return withTimeout(operation, remainingMs, () => new QueryTimeoutError(this.options.timeoutMs));
    }
}
