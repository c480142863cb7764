import { ConnectionStateStore } from '../failover/state-store.js';
import { FailoverCoordinator } from '../failover/index.js';
import { NotificationSink } from '../failover/events.js';
import {
    ConnectionCatalog,
    HealthCheckReport,
    HealthCheckResult,
    HealthCheckRunOptions,
} from './types.js';
import { toError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('HealthCheckRunner');

/**
 * Health Check Runner: "check one or all connections now"
 *
 * Drives `updateConnectionStatus` for each target and reads the stored
 * record back for the report. Used by the scheduler and the MCP tools.
 */
export class HealthCheckRunner {
    constructor(
        private readonly stateStore: ConnectionStateStore,
        private readonly coordinator: FailoverCoordinator,
        private readonly catalog: ConnectionCatalog,
        private readonly events: NotificationSink,
        private readonly dispatchLifecycleEvents: boolean
    ) { }

    public async run(options: HealthCheckRunOptions = {}): Promise<HealthCheckReport> {
        const dispatchEvents = options.dispatchEvents ?? this.dispatchLifecycleEvents;
        let connections: string[];

        if (options.connectionName !== undefined) {
            if (!this.catalog.hasConnection(options.connectionName)) {
                const error = `Connection '${options.connectionName}' is not configured`;
                logger.error(error);
                if (dispatchEvents) {
                    this.events.dispatch({ type: 'health-check:started', connections: [options.connectionName] });
                    this.events.dispatch({ type: 'health-check:finished', connections: [], success: false });
                }
                return { success: false, connections: [], results: [], error };
            }
            connections = [options.connectionName];
        } else {
            const { primary, failover } = this.coordinator.getRoles();
            connections = [primary, failover].filter(name => name.trim() !== '');
        }

        if (connections.length === 0) {
            logger.info('No connections to check');
            return { success: true, connections, results: [] };
        }

        if (dispatchEvents) {
            this.events.dispatch({ type: 'health-check:started', connections });
        }

        logger.info(`Starting database health checks for: ${connections.join(', ')}`);

        const results: HealthCheckResult[] = [];
        let success = true;

        for (const connectionName of connections) {
            try {
                await this.stateStore.updateConnectionStatus(connectionName);
                const record = await this.stateStore.getConnectionRecord(connectionName);
                results.push({
                    connectionName,
                    status: record.status,
                    failureCount: record.consecutiveFailures,
                });
                logger.info(`Connection '${connectionName}': ${record.status} (failures: ${record.consecutiveFailures})`);
            } catch (error) {
                success = false;
                logger.error(`Health check for '${connectionName}' aborted: ${toError(error).message}`);
            }
        }

        if (dispatchEvents) {
            this.events.dispatch({ type: 'health-check:finished', connections, success });
        }

        return { success, connections, results };
    }
}

/**
 * Health Check Scheduler: fixed-interval driver
 *
 * Each cycle runs the checks and then lets the coordinator re-decide.
 * A tick that fires while the previous cycle is still running is skipped.
 */
export class HealthCheckScheduler {
    private timer: NodeJS.Timeout | null = null;
    private running: Promise<void> | null = null;

    constructor(
        private readonly runner: HealthCheckRunner,
        private readonly coordinator: FailoverCoordinator,
        private readonly intervalMs: number
    ) { }

    public start(): void {
        if (this.timer) {
            return;
        }

        logger.info(`Starting health check schedule (every ${this.intervalMs}ms)`);
        void this.tick();
        this.timer = setInterval(() => {
            void this.tick();
        }, this.intervalMs);
    }

    public stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            logger.info('Stopped health check schedule');
        }
    }

    public isRunning(): boolean {
        return this.timer !== null;
    }

    /**
     * Run one cycle unless one is already in flight. Resolves when the
     * cycle (new or in flight) is done; never rejects.
     */
    public tick(): Promise<void> {
        if (this.running) {
            logger.debug('Previous health check cycle still running; skipping tick');
            return this.running;
        }

        this.running = this.cycle().finally(() => {
            this.running = null;
        });
        return this.running;
    }

    private async cycle(): Promise<void> {
        try {
            await this.runner.run();
            await this.coordinator.determineAndSetConnection();
        } catch (error) {
            logger.error(`Health check cycle failed: ${toError(error).message}`);
        }
    }
}

export * from './types.js';
