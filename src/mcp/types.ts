import type { ConfigLoader } from '../config/index.js';
import type { DatabaseManager } from '../database/manager.js';
import type { ConnectionStateStore, FailoverCoordinator } from '../services/failover/index.js';
import type { HealthCheckRunner } from '../services/health-check/index.js';

/**
 * Services the MCP tools, resources and prompts operate on
 */
export interface FailoverServices {
    config: ConfigLoader;
    databases: DatabaseManager;
    stateStore: ConnectionStateStore;
    coordinator: FailoverCoordinator;
    runner: HealthCheckRunner;
}
