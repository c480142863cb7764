import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigLoader } from '../config/index.js';
import { AppConfig } from '../config/schema.js';
import { DatabaseManager } from '../database/manager.js';
import { MemoryStore } from '../cache/memory-store.js';
import { createRedisStore, RedisClient } from '../cache/redis-store.js';
import { KeyValueStore } from '../cache/types.js';
import {
    ConnectionStateStore,
    FailoverCoordinator,
    FailoverEventBus,
    HealthProbe,
    resolveConnectionRoles,
} from '../services/failover/index.js';
import { HealthCheckRunner, HealthCheckScheduler } from '../services/health-check/index.js';
import { createLogger, setLogLevel } from '../utils/logger.js';
import { toError } from '../utils/errors.js';
import { registerResources } from './resources.js';
import { registerTools } from './tools.js';
import { registerPrompts } from './prompts.js';
import { FailoverServices } from './types.js';

const logger = createLogger('DbFailoverServer');

/**
 * Database Failover MCP Server
 *
 * Orchestrates:
 * - ConfigLoader (Configuration)
 * - DatabaseManager (Named connections, active default)
 * - ConnectionStateStore + FailoverCoordinator (Health & Decisions)
 * - HealthCheckScheduler (Periodic checks)
 * - MCP Interface (Resources, Tools, Prompts)
 */
export class DbFailoverServer {
    private server: McpServer;
    private config: AppConfig;
    private databases: DatabaseManager;
    private redisClient: RedisClient | null = null;
    private events: FailoverEventBus;
    private coordinator: FailoverCoordinator;
    private scheduler: HealthCheckScheduler;
    private services: FailoverServices;

    constructor(configLoader: ConfigLoader = new ConfigLoader()) {
        this.config = configLoader.load();
        setLogLevel(this.config.logLevel);

        const roles = resolveConnectionRoles(this.config.connections);
        const { healthCheck } = this.config;

        this.databases = new DatabaseManager(this.config.databases, roles.primary, roles.blocking);
        this.events = new FailoverEventBus();

        const probe = new HealthProbe(this.databases, {
            query: healthCheck.query,
            timeoutMs: healthCheck.timeoutSeconds * 1000,
        });
        const stateStore = new ConnectionStateStore(this.createStore(), probe, this.events, {
            roles,
            failureThreshold: healthCheck.failureThreshold,
            ttlSeconds: this.config.cache.ttlSeconds,
            prefix: this.config.cache.prefix,
            tag: this.config.cache.tag,
        });

        this.coordinator = new FailoverCoordinator(stateStore, this.databases, this.events, roles);
        const runner = new HealthCheckRunner(
            stateStore,
            this.coordinator,
            this.databases,
            this.events,
            healthCheck.dispatchLifecycleEvents
        );
        this.scheduler = new HealthCheckScheduler(runner, this.coordinator, healthCheck.intervalSeconds * 1000);

        this.services = {
            config: configLoader,
            databases: this.databases,
            stateStore,
            coordinator: this.coordinator,
            runner,
        };

        this.server = new McpServer({
            name: 'db-failover-mcp',
            version: '1.0.0',
        });

        this.initializeMcp();
        this.setupEventListeners();
    }

    /**
     * Register all MCP capabilities
     */
    private initializeMcp() {
        registerResources(this.server, this.services);
        registerTools(this.server, this.services);
        registerPrompts(this.server, this.services);
    }

    private createStore(): KeyValueStore {
        const { cache } = this.config;

        if (cache.driver === 'redis' && cache.redisUrl) {
            const { store, client } = createRedisStore(cache.redisUrl);
            this.redisClient = client;
            logger.info('Using Redis for connection health state');
            return store;
        }

        logger.info('Using in-memory store for connection health state');
        return new MemoryStore(cache.maxEntries);
    }

    /**
     * Log failover notifications
     */
    private setupEventListeners() {
        this.events.onEvent('primary:down', ({ connectionName }) => {
            logger.warn(`Primary database '${connectionName}' is DOWN`);
        });

        this.events.onEvent('failover:down', ({ connectionName }) => {
            logger.warn(`Failover database '${connectionName}' is DOWN`);
        });

        this.events.onEvent('primary:restored', ({ connectionName }) => {
            logger.info(`Primary database '${connectionName}' restored`);
        });

        this.events.onEvent('failover:restored', ({ connectionName }) => {
            logger.info(`Failover database '${connectionName}' restored`);
        });

        this.events.onEvent('limited-mode:activated', ({ connectionName }) => {
            logger.error(`Limited functionality mode ACTIVE (connection '${connectionName}')`);
        });

        this.events.onEvent('limited-mode:exited', ({ connectionName }) => {
            logger.info(`Limited functionality mode exited (connection '${connectionName}')`);
        });

        this.events.onEvent('cache:unavailable', ({ error }) => {
            logger.error(`Health state store unavailable: ${error.message}`);
        });
    }

    /**
     * Start the server
     */
    public async start() {
        try {
            if (this.config.enabled) {
                this.scheduler.start();
            } else {
                logger.warn('Database failover is disabled; no scheduled checks will run');
            }

            const transport = new StdioServerTransport();
            await this.server.connect(transport);

            logger.info('Database Failover MCP Server running on stdio');
        } catch (error) {
            logger.error(`Failed to start server: ${toError(error).message}`);
            await this.stop();
            process.exit(1);
        }
    }

    /**
     * Stop checks and release every connection
     */
    public async stop() {
        this.scheduler.stop();
        await this.databases.close();

        if (this.redisClient?.isOpen) {
            try {
                await this.redisClient.quit();
            } catch (error) {
                logger.warn(`Failed to close Redis client: ${toError(error).message}`);
            }
        }

        await this.server.close();
    }
}
