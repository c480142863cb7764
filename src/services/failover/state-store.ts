import { z } from 'zod';
import { HealthProbe } from './health-probe.js';
import { NotificationSink } from './events.js';
import { classifyRole } from './roles.js';
import { ConnectionHealthRecord, ConnectionStatus, StateStoreOptions } from './types.js';
import { KeyValueStore } from '../../cache/types.js';
import { toError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ConnectionStateStore');

/**
 * Shape of a record as serialized into the shared store
 */
const StoredRecordSchema = z.object({
    status: z.nativeEnum(ConnectionStatus),
    consecutiveFailures: z.number().int().min(0),
});

/**
 * Connection State Store: per-connection health with hysteresis
 *
 * Turns a stream of probe results into HEALTHY / DOWN / UNKNOWN:
 * - A connection goes DOWN only after `failureThreshold` consecutive failures
 * - One successful probe resets it to HEALTHY
 * - Down and restored notifications fire once per transition, per role
 *
 * All state lives in the shared key-value store under a TTL. A store that
 * cannot be reached never surfaces as an exception here: reads fall back to
 * UNKNOWN / 0 and every failing call publishes `cache:unavailable`.
 *
 * The failure counter is a plain read-increment-write. Two overlapping
 * probes of the same connection can lose one increment, which delays DOWN by
 * at most one probe cycle.
 */
export class ConnectionStateStore {
    private readonly tag: string;

    constructor(
        private readonly store: KeyValueStore,
        private readonly probe: HealthProbe,
        private readonly events: NotificationSink,
        private readonly options: StateStoreOptions
    ) {
        this.tag = options.tag;

        if (this.tag && !this.store.invalidateGroup) {
            logger.warn('Configured cache store does not support group invalidation; flushAllStatuses will be a no-op');
        }
    }

    /**
     * Probe `connectionName` and fold the result into its persisted record
     */
    public async updateConnectionStatus(connectionName: string): Promise<ConnectionHealthRecord> {
        const healthy = await this.probe.isHealthy(connectionName);
        const previousStatus = await this.getConnectionStatus(connectionName);
        const role = classifyRole(connectionName, this.options.roles);

        if (healthy) {
            const record = this.toRecord(connectionName, ConnectionStatus.HEALTHY, 0);
            await this.persist(record);
            this.events.dispatch({ type: 'connection:healthy', connectionName });

            if (previousStatus === ConnectionStatus.DOWN) {
                if (role === 'primary') {
                    logger.info(`Primary connection '${connectionName}' restored`);
                    this.events.dispatch({ type: 'primary:restored', connectionName });
                } else if (role === 'failover') {
                    logger.info(`Failover connection '${connectionName}' restored`);
                    this.events.dispatch({ type: 'failover:restored', connectionName });
                }
            }

            return record;
        }

        const failures = (await this.getFailureCount(connectionName)) + 1;

        if (failures < this.options.failureThreshold) {
            const record = this.toRecord(connectionName, ConnectionStatus.UNKNOWN, failures);
            await this.persist(record);
            logger.debug(`Connection '${connectionName}' unhealthy, failure count: ${failures}/${this.options.failureThreshold}`);
            return record;
        }

        const record = this.toRecord(connectionName, ConnectionStatus.DOWN, failures);
        await this.persist(record);

        if (previousStatus === ConnectionStatus.DOWN) {
            logger.debug(`Connection '${connectionName}' still DOWN, failure count: ${failures}`);
            return record;
        }

        logger.warn(`Connection '${connectionName}' marked as DOWN after ${failures} failures`);

        if (role === 'primary') {
            this.events.dispatch({ type: 'primary:down', connectionName });
        } else if (role === 'failover') {
            this.events.dispatch({ type: 'failover:down', connectionName });
        } else {
            logger.warn(`No role-specific down event for connection '${connectionName}' (role: ${role})`);
        }

        return record;
    }

    /**
     * Current status; UNKNOWN when absent, unparsable or unreadable
     */
    public async getConnectionStatus(connectionName: string): Promise<ConnectionStatus> {
        try {
            const record = await this.read(connectionName);
            return record?.status ?? ConnectionStatus.UNKNOWN;
        } catch (error) {
            this.reportCacheFailure(`Failed to read status for '${connectionName}'`, error);
            return ConnectionStatus.UNKNOWN;
        }
    }

    /**
     * Current consecutive-failure count; 0 when absent or unreadable
     */
    public async getFailureCount(connectionName: string): Promise<number> {
        try {
            const record = await this.read(connectionName);
            return record?.consecutiveFailures ?? 0;
        } catch (error) {
            this.reportCacheFailure(`Failed to read failure count for '${connectionName}'`, error);
            return 0;
        }
    }

    /**
     * Full record in one read, with the same fallbacks as the getters above
     */
    public async getConnectionRecord(connectionName: string): Promise<ConnectionHealthRecord> {
        try {
            const record = await this.read(connectionName);
            return record ?? this.toRecord(connectionName, ConnectionStatus.UNKNOWN, 0);
        } catch (error) {
            this.reportCacheFailure(`Failed to read record for '${connectionName}'`, error);
            return this.toRecord(connectionName, ConnectionStatus.UNKNOWN, 0);
        }
    }

    /**
     * Unconditional overwrite for administrative resets. Publishes no
     * health notifications.
     *
     * Without an explicit count, DOWN is stored at the threshold and
     * UNKNOWN at 0. HEALTHY is always stored at 0 and DOWN never below the
     * threshold. A count that is not a non-negative integer is rejected
     * with a RangeError and nothing is written.
     */
    public async setConnectionStatus(
        connectionName: string,
        status: ConnectionStatus,
        failureCount?: number
    ): Promise<void> {
        const count = this.failureCountFor(status, failureCount);

        if (await this.persist(this.toRecord(connectionName, status, count))) {
            logger.info(`Connection '${connectionName}' status explicitly set to '${status}'`);
        }
    }

    /**
     * Drop every record written under the configured tag.
     * Returns false when the store or configuration cannot do it.
     */
    public async flushAllStatuses(): Promise<boolean> {
        if (!this.tag || !this.store.invalidateGroup) {
            logger.warn('Cache store does not support group invalidation or no tag is configured; statuses were not flushed');
            return false;
        }

        try {
            const removed = await this.store.invalidateGroup(this.tag);
            logger.info(`Flushed ${removed} connection status record(s) using tag '${this.tag}'`);
            return true;
        } catch (error) {
            this.reportCacheFailure('Failed to flush connection statuses', error);
            return false;
        }
    }

    public async isConnectionHealthy(connectionName: string): Promise<boolean> {
        return (await this.getConnectionStatus(connectionName)) === ConnectionStatus.HEALTHY;
    }

    public async isConnectionDown(connectionName: string): Promise<boolean> {
        return (await this.getConnectionStatus(connectionName)) === ConnectionStatus.DOWN;
    }

    public async isConnectionUnknown(connectionName: string): Promise<boolean> {
        return (await this.getConnectionStatus(connectionName)) === ConnectionStatus.UNKNOWN;
    }

    /**
     * Read and validate a record. Throws only when the store itself fails.
     */
    private async read(connectionName: string): Promise<ConnectionHealthRecord | null> {
        const raw = await this.store.get(this.keyFor(connectionName));
        if (raw === null) {
            return null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch {
            parsed = null;
        }

        const result = StoredRecordSchema.safeParse(parsed);
        if (!result.success) {
            logger.warn(`Invalid record found in cache for '${connectionName}'; treating as UNKNOWN`);
            return null;
        }

        return this.toRecord(connectionName, result.data.status, result.data.consecutiveFailures);
    }

    private async persist(record: ConnectionHealthRecord): Promise<boolean> {
        const payload = JSON.stringify({
            status: record.status,
            consecutiveFailures: record.consecutiveFailures,
        });

        try {
            await this.store.put(
                this.keyFor(record.connectionName),
                payload,
                this.options.ttlSeconds,
                this.tag || undefined
            );
            return true;
        } catch (error) {
            this.reportCacheFailure(`Failed to write status for '${record.connectionName}'`, error);
            return false;
        }
    }

    private failureCountFor(status: ConnectionStatus, failureCount?: number): number {
        if (failureCount !== undefined && !(Number.isInteger(failureCount) && failureCount >= 0)) {
            throw new RangeError(`Failure count must be a non-negative integer, got ${failureCount}`);
        }

        switch (status) {
            case ConnectionStatus.HEALTHY:
                return 0;
            case ConnectionStatus.DOWN:
                return Math.max(failureCount ?? this.options.failureThreshold, this.options.failureThreshold);
            case ConnectionStatus.UNKNOWN:
                return Math.max(failureCount ?? 0, 0);
        }
    }

    private reportCacheFailure(message: string, error: unknown): void {
        const cause = toError(error);
        logger.error(`${message}: ${cause.message}`);
        this.events.dispatch({ type: 'cache:unavailable', error: cause });
    }

    private keyFor(connectionName: string): string {
        return `${this.options.prefix}_conn_health_${connectionName}`;
    }

    private toRecord(
        connectionName: string,
        status: ConnectionStatus,
        consecutiveFailures: number
    ): ConnectionHealthRecord {
        return { connectionName, status, consecutiveFailures };
    }
}
