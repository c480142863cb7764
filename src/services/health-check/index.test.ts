import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthCheckRunner, HealthCheckScheduler } from './index.js';
import {
    ConnectionResolver,
    ConnectionStateStore,
    ConnectionStatus,
    DatabaseConnection,
    DEFAULT_CONNECTION_ROLES,
    FailoverCoordinator,
    FailoverEvent,
    HealthProbe,
    NotificationSink,
} from '../failover/index.js';
import { MemoryStore } from '../../cache/memory-store.js';

vi.mock('../../utils/logger.js', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
    createLogger: () => ({
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }),
}));

class ScriptedResolver implements ConnectionResolver {
    public readonly down = new Set<string>();
    public readonly resolved: string[] = [];

    public async resolve(connectionName: string): Promise<DatabaseConnection> {
        this.resolved.push(connectionName);
        const healthy = !this.down.has(connectionName);
        return {
            name: connectionName,
            run: async () => {
                if (!healthy) throw new Error('connection refused');
            },
            setQueryTimeout: async () => undefined,
            release: () => undefined,
        };
    }
}

describe('HealthCheckRunner', () => {
    let resolver: ScriptedResolver;
    let events: FailoverEvent[];
    let sink: NotificationSink;
    let stateStore: ConnectionStateStore;
    let coordinator: FailoverCoordinator;
    const catalog = { hasConnection: (name: string) => ['primary', 'failover', 'blocking'].includes(name) };

    beforeEach(() => {
        resolver = new ScriptedResolver();
        events = [];
        sink = { dispatch: (event) => { events.push(event); } };
        stateStore = new ConnectionStateStore(
            new MemoryStore(),
            new HealthProbe(resolver, { query: 'SELECT 1', timeoutMs: 1000 }),
            sink,
            {
                roles: { ...DEFAULT_CONNECTION_ROLES },
                failureThreshold: 2,
                ttlSeconds: 60,
                prefix: 'test_failover',
                tag: 'test-failover',
            }
        );
        coordinator = new FailoverCoordinator(
            stateStore,
            { setActiveConnection: () => undefined, getActiveConnection: () => 'primary' },
            sink,
            DEFAULT_CONNECTION_ROLES
        );
    });

    it('should check primary and failover and report stored results', async () => {
        resolver.down.add('failover');
        const runner = new HealthCheckRunner(stateStore, coordinator, catalog, sink, true);

        const report = await runner.run();

        expect(report).toEqual({
            success: true,
            connections: ['primary', 'failover'],
            results: [
                { connectionName: 'primary', status: ConnectionStatus.HEALTHY, failureCount: 0 },
                { connectionName: 'failover', status: ConnectionStatus.UNKNOWN, failureCount: 1 },
            ],
        });
        expect(events).toEqual([
            { type: 'health-check:started', connections: ['primary', 'failover'] },
            { type: 'connection:healthy', connectionName: 'primary' },
            { type: 'health-check:finished', connections: ['primary', 'failover'], success: true },
        ]);
    });

    it('should check only the named connection', async () => {
        const runner = new HealthCheckRunner(stateStore, coordinator, catalog, sink, true);

        const report = await runner.run({ connectionName: 'failover' });

        expect(report.connections).toEqual(['failover']);
        expect(resolver.resolved).toEqual(['failover']);
    });

    it('should refuse a connection that is not configured', async () => {
        const runner = new HealthCheckRunner(stateStore, coordinator, catalog, sink, true);

        await expect(runner.run({ connectionName: 'reporting' })).resolves.toEqual({
            success: false,
            connections: [],
            results: [],
            error: "Connection 'reporting' is not configured",
        });
        expect(resolver.resolved).toEqual([]);
        expect(events).toEqual([
            { type: 'health-check:started', connections: ['reporting'] },
            { type: 'health-check:finished', connections: [], success: false },
        ]);
    });

    it('should refuse an unconfigured connection quietly when lifecycle events are off', async () => {
        const runner = new HealthCheckRunner(stateStore, coordinator, catalog, sink, false);

        const report = await runner.run({ connectionName: 'reporting' });

        expect(report.success).toBe(false);
        expect(events).toEqual([]);
    });

    it('should honour the per-run lifecycle event override', async () => {
        const quiet = new HealthCheckRunner(stateStore, coordinator, catalog, sink, true);
        await quiet.run({ dispatchEvents: false });
        expect(events.filter(event => event.type.startsWith('health-check:'))).toEqual([]);

        const loud = new HealthCheckRunner(stateStore, coordinator, catalog, sink, false);
        await loud.run({ connectionName: 'primary', dispatchEvents: true });
        expect(events.filter(event => event.type.startsWith('health-check:')).map(event => event.type))
            .toEqual(['health-check:started', 'health-check:finished']);
    });
});

describe('HealthCheckScheduler', () => {
    let runner: HealthCheckRunner;
    let coordinator: FailoverCoordinator;
    let scheduler: HealthCheckScheduler;

    beforeEach(() => {
        const sink: NotificationSink = { dispatch: () => undefined };
        const stateStore = new ConnectionStateStore(
            new MemoryStore(),
            new HealthProbe(new ScriptedResolver(), { query: 'SELECT 1', timeoutMs: 1000 }),
            sink,
            {
                roles: { ...DEFAULT_CONNECTION_ROLES },
                failureThreshold: 3,
                ttlSeconds: 60,
                prefix: 'test_failover',
                tag: '',
            }
        );
        coordinator = new FailoverCoordinator(
            stateStore,
            { setActiveConnection: () => undefined, getActiveConnection: () => 'primary' },
            sink,
            DEFAULT_CONNECTION_ROLES
        );
        runner = new HealthCheckRunner(stateStore, coordinator, { hasConnection: () => true }, sink, false);
        scheduler = new HealthCheckScheduler(runner, coordinator, 1000);
    });

    afterEach(() => {
        scheduler.stop();
        vi.useRealTimers();
    });

    it('should run the checks and then re-decide', async () => {
        const run = vi.spyOn(runner, 'run');
        const decide = vi.spyOn(coordinator, 'determineAndSetConnection');

        await scheduler.tick();

        expect(run).toHaveBeenCalledTimes(1);
        expect(decide).toHaveBeenCalledTimes(1);
        expect(coordinator.getCurrentActiveConnectionName()).toBe('primary');
    });

    it('should skip a tick while a cycle is still running', async () => {
        const run = vi.spyOn(runner, 'run');

        await Promise.all([scheduler.tick(), scheduler.tick()]);

        expect(run).toHaveBeenCalledTimes(1);
    });

    it('should log a failing cycle instead of rejecting', async () => {
        vi.spyOn(runner, 'run').mockRejectedValue(new Error('boom'));
        const decide = vi.spyOn(coordinator, 'determineAndSetConnection');

        await expect(scheduler.tick()).resolves.toBeUndefined();
        expect(decide).not.toHaveBeenCalled();
    });

    it('should run at once and then on every interval until stopped', async () => {
        vi.useFakeTimers();
        const run = vi.spyOn(runner, 'run').mockResolvedValue({ success: true, connections: [], results: [] });
        vi.spyOn(coordinator, 'determineAndSetConnection').mockResolvedValue('primary');

        scheduler.start();
        expect(scheduler.isRunning()).toBe(true);
        await vi.advanceTimersByTimeAsync(0);
        expect(run).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(1000);
        expect(run).toHaveBeenCalledTimes(2);

        scheduler.stop();
        expect(scheduler.isRunning()).toBe(false);
        await vi.advanceTimersByTimeAsync(5000);
        expect(run).toHaveBeenCalledTimes(2);
    });
});
