import { describe, it, expect, vi } from 'vitest';
import { classifyRole, resolveConnectionRoles } from './roles.js';

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

describe('connection roles', () => {
    it('should keep configured names and fill blanks with defaults', () => {
        expect(resolveConnectionRoles({ primary: ' main ', failover: '   ' })).toEqual({
            primary: 'main',
            failover: 'failover',
            blocking: 'blocking',
        });
    });

    it('should classify each role and everything else as other', () => {
        const roles = { primary: 'main', failover: 'replica', blocking: 'offline' };

        expect(classifyRole('main', roles)).toBe('primary');
        expect(classifyRole('replica', roles)).toBe('failover');
        expect(classifyRole('offline', roles)).toBe('blocking');
        expect(classifyRole('reporting', roles)).toBe('other');
    });
});
