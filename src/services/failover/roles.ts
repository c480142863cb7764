import { ConnectionRole, ConnectionRoles } from './types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ConnectionRoles');

export const DEFAULT_CONNECTION_ROLES: Readonly<ConnectionRoles> = {
    primary: 'primary',
    failover: 'failover',
    blocking: 'blocking',
};

/**
 * Fill blank or missing role names with the built-in defaults.
 * A misconfigured role is a startup warning, not a construction failure.
 */
export function resolveConnectionRoles(raw: Partial<ConnectionRoles>): ConnectionRoles {
    const resolved: ConnectionRoles = { ...DEFAULT_CONNECTION_ROLES };
    const missing: string[] = [];

    for (const role of ['primary', 'failover', 'blocking'] as const) {
        const name = raw[role]?.trim();
        if (name) {
            resolved[role] = name;
        } else {
            missing.push(role);
        }
    }

    if (missing.length > 0) {
        logger.warn(
            `Connection role(s) ${missing.join(', ')} not configured; falling back to defaults`,
            { resolved }
        );
    }

    return resolved;
}

/**
 * Which configured role, if any, a connection name plays
 */
export function classifyRole(connectionName: string, roles: ConnectionRoles): ConnectionRole {
    if (connectionName === roles.primary) return 'primary';
    if (connectionName === roles.failover) return 'failover';
    if (connectionName === roles.blocking) return 'blocking';
    return 'other';
}
