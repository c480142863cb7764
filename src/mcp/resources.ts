import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { FailoverServices } from './types.js';
import { redactConfig } from '../config/index.js';

/**
 * Register MCP resources
 */
export function registerResources(server: McpServer, services: FailoverServices) {
    // 1. failover://status - active connection and per-role health
    server.resource(
        'failover-status',
        'failover://status',
        {
            description: 'Active database connection and stored health of each role',
            mimeType: 'application/json',
        },
        async () => {
            const roles = services.coordinator.getRoles();
            const [primary, failover] = await Promise.all([
                services.stateStore.getConnectionRecord(roles.primary),
                services.stateStore.getConnectionRecord(roles.failover),
            ]);
            const activeConnectionName = services.coordinator.getCurrentActiveConnectionName();

            return {
                contents: [
                    {
                        uri: 'failover://status',
                        mimeType: 'application/json',
                        text: JSON.stringify({
                            activeConnectionName,
                            limitedFunctionality: activeConnectionName === roles.blocking,
                            roles,
                            connections: { primary, failover },
                            generatedAt: new Date().toISOString(),
                        }, null, 2),
                    },
                ],
            };
        }
    );

    // 2. config://current - effective configuration, credentials masked
    server.resource(
        'config-current',
        'config://current',
        {
            description: 'Current active configuration',
            mimeType: 'application/json',
        },
        async () => {
            return {
                contents: [
                    {
                        uri: 'config://current',
                        mimeType: 'application/json',
                        text: JSON.stringify(redactConfig(services.config.getConfig()), null, 2),
                    },
                ],
            };
        }
    );
}
