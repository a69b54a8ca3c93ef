import { LogLevel, Logger, getLogger, parseLogLevel } from '../../src/core/logging.js';

describe('parseLogLevel', () => {
    it('maps level names case-insensitively and defaults to INFO', () => {
        expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
        expect(parseLogLevel('WARNING')).toBe(LogLevel.WARNING);
        expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
        expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
        expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    });
});

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('takes its level from the environment', () => {
        expect(getLogger('ade.test').level).toBe(LogLevel.SILENT);
    });

    it('drops messages below the minimum level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const logger = new Logger('ade.test', LogLevel.WARNING);

        logger.debug('hidden');
        logger.info('hidden');
        logger.warning('shown', { attempt: 1 });

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toContain('[WARNING]');
        expect(warn.mock.calls[0][0]).toContain('ade.test');
        expect(warn.mock.calls[0][0]).toMatch(/shown$/);
        expect(warn.mock.calls[0][1]).toEqual({ attempt: 1 });
    });

    it('logs nothing when silent', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = new Logger('ade.test', LogLevel.SILENT);

        logger.error('hidden', new Error('boom'));

        expect(error).not.toHaveBeenCalled();
    });

    it('can change level after creation', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new Logger('ade.test', LogLevel.ERROR);

        logger.setLevel(LogLevel.DEBUG);
        logger.debug('now visible');

        expect(log).toHaveBeenCalledTimes(1);
    });
});
