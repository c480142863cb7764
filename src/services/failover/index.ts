import { ConnectionStateStore } from './state-store.js';
import { NotificationSink } from './events.js';
import { classifyRole, resolveConnectionRoles } from './roles.js';
import {
    ActiveConnectionSink,
    ConnectionRoles,
    ConnectionStatus,
    FailoverDecision,
} from './types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('FailoverCoordinator');

/**
 * Failover Coordinator: picks and applies the active connection
 *
 * Features:
 * - Fixed priority: primary, then failover, then the blocking stand-in
 * - Optimistic default to primary while nothing has been recorded yet
 * - Switch and limited-functionality notifications only on an actual change
 * - Administrative overrides for operators
 *
 * The last applied connection is remembered per instance and never shared
 * between processes; a fresh coordinator announces its first decision even
 * when another process already made the same switch.
 */
export class FailoverCoordinator {
    private readonly roles: ConnectionRoles;
    private currentActiveConnectionName: string | null = null;

    constructor(
        private readonly stateStore: ConnectionStateStore,
        private readonly connections: ActiveConnectionSink,
        private readonly events: NotificationSink,
        roles: Partial<ConnectionRoles>
    ) {
        this.roles = resolveConnectionRoles(roles);
    }

    /**
     * Resolve the connection that should be active and apply it if it
     * changed since the last call.
     */
    public async determineAndSetConnection(): Promise<string> {
        const target = await this.resolveActiveConnection();
        const decision = this.apply(target);

        if (!decision.switched) {
            logger.debug(`No change in active database connection. Still using '${target}'`);
        }

        return target;
    }

    /**
     * Decision policy. Reads only; applies nothing.
     */
    public async resolveActiveConnection(): Promise<string> {
        const { primary, failover, blocking } = this.roles;

        const primaryStatus = await this.stateStore.getConnectionStatus(primary);
        const failoverStatus = await this.stateStore.getConnectionStatus(failover);

        // Empty store (never probed, flushed, or unreadable) is treated
        // optimistically rather than as "both down".
        if (
            primaryStatus === ConnectionStatus.UNKNOWN &&
            failoverStatus === ConnectionStatus.UNKNOWN &&
            (await this.stateStore.getFailureCount(primary)) === 0 &&
            (await this.stateStore.getFailureCount(failover)) === 0
        ) {
            logger.warn(`No health state recorded yet (or cache unavailable). Defaulting to primary connection '${primary}'`);
            return primary;
        }

        if (primaryStatus === ConnectionStatus.HEALTHY) {
            logger.debug(`Primary connection '${primary}' is HEALTHY`);
            return primary;
        }

        logger.warn(`Primary connection '${primary}' is not healthy (status: ${primaryStatus}). Checking failover`);

        if (failoverStatus === ConnectionStatus.HEALTHY) {
            logger.info(`Failover connection '${failover}' is HEALTHY`);
            return failover;
        }

        logger.error(
            `Both primary ('${primary}': ${primaryStatus}) and failover ('${failover}': ${failoverStatus}) are unavailable. Activating blocking connection '${blocking}'`
        );
        return blocking;
    }

    /**
     * Operator override: trust primary again. Both role records are reset
     * to HEALTHY so the next decision agrees with the override.
     */
    public async forceSwitchToPrimary(): Promise<FailoverDecision> {
        logger.info(`Forcing switch to primary connection '${this.roles.primary}'. Previous: ${this.currentActiveConnectionName}`);

        await this.stateStore.setConnectionStatus(this.roles.primary, ConnectionStatus.HEALTHY, 0);
        await this.stateStore.setConnectionStatus(this.roles.failover, ConnectionStatus.HEALTHY, 0);

        return this.apply(this.roles.primary);
    }

    /**
     * Operator override: prefer failover. Persisted health is left alone.
     */
    public async forceSwitchToFailover(): Promise<FailoverDecision> {
        logger.info(`Forcing switch to failover connection '${this.roles.failover}'. Previous: ${this.currentActiveConnectionName}`);

        return this.apply(this.roles.failover);
    }

    /**
     * Last applied connection, or the host's default before the first decision
     */
    public getCurrentActiveConnectionName(): string {
        return this.currentActiveConnectionName ?? this.connections.getActiveConnection();
    }

    public getRoles(): ConnectionRoles {
        return { ...this.roles };
    }

    /**
     * Switch the host to `target` when it differs from the remembered
     * connection and publish the matching notifications. Errors from the
     * host's setter propagate and leave the remembered value untouched.
     */
    private apply(target: string): FailoverDecision {
        const previous = this.currentActiveConnectionName;

        if (previous === target) {
            return { activeConnectionName: target, previousConnectionName: previous, switched: false };
        }

        logger.info(`Switching default database connection from '${previous}' to '${target}'`);
        this.connections.setActiveConnection(target);
        this.currentActiveConnectionName = target;

        const role = classifyRole(target, this.roles);

        switch (role) {
            case 'primary':
                logger.info(`Switched to PRIMARY '${target}' from '${previous}'`);
                this.events.dispatch({ type: 'switched:primary', previousConnectionName: previous, connectionName: target });
                break;
            case 'failover':
                logger.info(`Switched to FAILOVER '${target}' from '${previous}'`);
                this.events.dispatch({ type: 'switched:failover', previousConnectionName: previous, connectionName: target });
                break;
            case 'blocking':
                logger.warn(`Switched to blocking connection '${target}'. Limited functionality mode activated`);
                this.events.dispatch({ type: 'limited-mode:activated', connectionName: target });
                break;
            case 'other':
                logger.warn(`Switched to '${target}', which plays no configured role`);
                break;
        }

        if (previous === this.roles.blocking && (role === 'primary' || role === 'failover')) {
            logger.info(`Exiting limited functionality mode. Now using '${target}'`);
            this.events.dispatch({ type: 'limited-mode:exited', connectionName: target });
        }

        return { activeConnectionName: target, previousConnectionName: previous, switched: true };
    }
}

export * from './types.js';
export * from './events.js';
export * from './roles.js';
export { HealthProbe } from './health-probe.js';
export { ConnectionStateStore } from './state-store.js';
