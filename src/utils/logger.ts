import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

/**
 * Single-line format: `<time> [<level>] (<context>): <message> {meta}`
 */
const logFormat = printf(({ level, message, timestamp, context, stack, ...metadata }) => {
    let msg = `${timestamp} [${level}]`;

    if (context) {
        msg += ` (${context})`;
    }

    msg += `: ${stack ?? message}`;

    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }

    return msg;
});

/**
 * Winston logger shared by the failover services.
 *
 * Everything goes to stderr: stdout carries the MCP stdio transport and
 * must stay clean.
 */
export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
            format: combine(
                errors({ stack: true }),
                colorize({ all: true }),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                logFormat
            ),
        }),
    ],
});

/**
 * Apply the configured level once config has been loaded
 */
export function setLogLevel(level: string): void {
    logger.level = level;
}

/**
 * Create a child logger with a specific context
 */
export function createLogger(context: string): winston.Logger {
    return logger.child({ context });
}
