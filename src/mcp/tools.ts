import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { FailoverServices } from './types.js';
import { toError } from '../utils/errors.js';

function textResult(payload: unknown, isError = false) {
    return {
        content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
        isError,
    };
}

/**
 * Register MCP tools
 */
export function registerTools(server: McpServer, services: FailoverServices) {
    // 1. check-health - probe now and fold results into stored health
    server.tool(
        'check-health',
        {
            connection: z.string().optional().describe('Connection to check; primary and failover if omitted'),
            dispatchEvents: z.boolean().optional().describe('Publish health-check started/finished events'),
        },
        async ({ connection, dispatchEvents }) => {
            const report = await services.runner.run({ connectionName: connection, dispatchEvents });
            return textResult(report, !report.success);
        }
    );

    // 2. resolve-connection - re-decide and apply the active connection
    server.tool(
        'resolve-connection',
        {},
        async () => {
            const previous = services.coordinator.getCurrentActiveConnectionName();
            try {
                const active = await services.coordinator.determineAndSetConnection();
                return textResult({ activeConnectionName: active, previousConnectionName: previous });
            } catch (error) {
                return textResult({ error: toError(error).message }, true);
            }
        }
    );

    // 3. force-primary - operator override, trusts primary again
    server.tool(
        'force-primary',
        {},
        async () => {
            try {
                return textResult(await services.coordinator.forceSwitchToPrimary());
            } catch (error) {
                return textResult({ error: toError(error).message }, true);
            }
        }
    );

    // 4. force-failover - operator override, prefers failover
    server.tool(
        'force-failover',
        {},
        async () => {
            try {
                return textResult(await services.coordinator.forceSwitchToFailover());
            } catch (error) {
                return textResult({ error: toError(error).message }, true);
            }
        }
    );

    // 5. flush-statuses - drop all stored health records
    server.tool(
        'flush-statuses',
        {},
        async () => {
            const flushed = await services.stateStore.flushAllStatuses();
            if (flushed) {
                return {
                    content: [{ type: 'text' as const, text: 'All connection health statuses were flushed.' }],
                };
            }
            return {
                content: [{ type: 'text' as const, text: 'Statuses were not flushed. Check server logs.' }],
                isError: true,
            };
        }
    );
}
