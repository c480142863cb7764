#!/usr/bin/env node
import { DbFailoverServer } from './mcp/server.js';
import { logger } from './utils/logger.js';
import { toError } from './utils/errors.js';

/**
 * Application Entry Point
 */
async function main() {
    const server = new DbFailoverServer();

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down...`);
        void server.stop()
            .catch((error: unknown) => logger.error(`Error during shutdown: ${toError(error).message}`))
            .finally(() => process.exit(0));
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    process.on('uncaughtException', (error) => {
        logger.error('Uncaught Exception:', error);
        process.exit(1);
    });

    await server.start();
}

main().catch((error) => {
    logger.error('Fatal error during startup:', error);
    process.exit(1);
});
