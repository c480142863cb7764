import { readFileSync } from 'fs';
import { AppConfig, AppConfigSchema, LogLevel, buildDefaultConfig, envLogLevel } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, toError } from '../utils/errors.js';

/**
 * ConfigLoader: one-shot configuration loading
 *
 * Sources, first match wins:
 * - DB_FAILOVER_CONFIG: inline JSON
 * - DB_FAILOVER_CONFIG_FILE: path to a JSON file
 * - Defaults built from DB_PRIMARY_URL / DB_FAILOVER_URL
 *
 * Everything is validated with Zod. Invalid input is logged and replaced by
 * the defaults; loading never throws. The result is fixed for the lifetime
 * of the process.
 */
export class ConfigLoader {
    private config: AppConfig;

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
        this.config = buildDefaultConfig(env);
    }

    /**
     * Get current configuration
     */
    public getConfig(): AppConfig {
        return this.config;
    }

    /**
     * Load configuration from the first available source
     */
    public load(): AppConfig {
        const inline = this.env.DB_FAILOVER_CONFIG?.trim();
        const file = this.env.DB_FAILOVER_CONFIG_FILE?.trim();

        if (inline) {
            logger.info('DB_FAILOVER_CONFIG detected, parsing inline JSON');
            this.config = this.parse(() => inline, 'DB_FAILOVER_CONFIG');
        } else if (file) {
            logger.info(`Loading configuration from file: ${file}`);
            this.config = this.parse(() => readFileSync(file, 'utf-8'), file);
        } else {
            logger.info('No configuration source set, using defaults from environment');
            this.config = buildDefaultConfig(this.env);
        }

        return this.config;
    }

    /**
     * Read and validate one source, falling back to defaults on any problem
     */
    private parse(read: () => string, source: string): AppConfig {
        try {
            const validated = parseConfig(read(), source, envLogLevel(this.env));
            logger.info(`Loaded configuration from ${source}: ${Object.keys(validated.databases).length} database(s)`);
            return validated;
        } catch (error) {
            logger.error(`Failed to load configuration from ${source}: ${toError(error).message}. Using defaults.`);
            return buildDefaultConfig(this.env);
        }
    }
}

/**
 * Parse and validate configuration JSON. `fallbackLogLevel` applies when
 * the document does not set `logLevel` itself.
 *
 * @throws ConfigurationError when the text is not JSON or fails validation
 */
export function parseConfig(text: string, source: string, fallbackLogLevel?: LogLevel): AppConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ConfigurationError(`Invalid JSON in ${source}: ${toError(error).message}`, { cause: error });
    }

    if (fallbackLogLevel && typeof raw === 'object' && raw !== null && !Array.isArray(raw) && !('logLevel' in raw)) {
        raw = { ...raw, logLevel: fallbackLogLevel };
    }

    const result = AppConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration in ${source}: ${issues}`);
    }

    return result.data;
}

/**
 * Mask the password in a connection URL. Unparsable values are hidden
 * entirely.
 */
export function redactUrl(url: string): string {
    try {
        const parsed = new URL(url);
        if (parsed.password) {
            parsed.password = '***';
        }
        return parsed.toString();
    } catch {
        return '[redacted]';
    }
}

/**
 * Copy of `config` that is safe to show to clients
 */
export function redactConfig(config: AppConfig): AppConfig {
    const databases: AppConfig['databases'] = {};
    for (const [name, database] of Object.entries(config.databases)) {
        databases[name] = database.driver === 'postgres'
            ? { ...database, url: redactUrl(database.url) }
            : database;
    }

    return {
        ...config,
        databases,
        cache: {
            ...config.cache,
            redisUrl: config.cache.redisUrl === undefined ? undefined : redactUrl(config.cache.redisUrl),
        },
    };
}
