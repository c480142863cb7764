import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { FailoverServices } from './types.js';

/**
 * Register MCP prompts
 */
export function registerPrompts(server: McpServer, services: FailoverServices) {
    // 1. diagnose-failover
    server.prompt(
        'diagnose-failover',
        {},
        () => {
            const { primary, failover, blocking } = services.coordinator.getRoles();
            return {
                messages: [
                    {
                        role: 'user',
                        content: {
                            type: 'text',
                            text: `Diagnose the current state of database failover.

The primary connection is '${primary}', the failover connection is '${failover}' and '${blocking}' is the blocking stand-in used in limited functionality mode.

First, read the 'failover://status' resource to see the active connection and the stored health of each role.
Then, call 'check-health' to probe both connections now and compare the results.

Report:
1. Which connection is active and whether the application is in limited functionality mode.
2. The status and consecutive failure count of each connection.
3. Whether 'resolve-connection' would change the active connection.
4. Recommended operator action, if any ('force-primary', 'force-failover' or 'flush-statuses'), and its risk.`,
                        },
                    },
                ],
            };
        }
    );
}
