/**
 * Logger level tests
 */

import logger, { setLogLevel } from '../../src/shared/logger';

describe('logger', () => {
    const original = process.env.LOG_LEVEL;

    afterEach(() => {
        setLogLevel('info');
        if (original === undefined) delete process.env.LOG_LEVEL;
        else process.env.LOG_LEVEL = original;
    });

    it('should start at info whatever the environment says', async () => {
        process.env.LOG_LEVEL = 'debug';
        await jest.isolateModulesAsync(async () => {
            const fresh = await import('../../src/shared/logger');
            expect(fresh.default.level).toBe('info');
        });
    });

    it('should change level through setLogLevel', () => {
        setLogLevel('DEBUG');
        expect(logger.level).toBe('debug');
    });

    it('should fall back to info for unknown levels', () => {
        setLogLevel('loud');
        expect(logger.level).toBe('info');
    });
});
