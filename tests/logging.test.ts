import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import winston from 'winston';
import { getLogger, setLogLevel } from '../src/logging';
import { PROGRAM_NAME } from '../src/constants';

describe('Logging module', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    afterEach(() => {
        setLogLevel('error');
        vi.restoreAllMocks();
    });

    test('getLogger returns a logger instance', () => {
        const logger = getLogger();

        expect(typeof logger.info).toBe('function');
        expect(typeof logger.verbose).toBe('function');
        expect(typeof logger.debug).toBe('function');
    });

    test('setLogLevel creates a new logger with the specified level', () => {
        const createLoggerSpy = vi.spyOn(winston, 'createLogger');

        setLogLevel('debug');

        expect(createLoggerSpy).toHaveBeenCalledTimes(1);
        const options = createLoggerSpy.mock.calls[0][0];
        expect(options?.level).toBe('debug');
        expect(options?.defaultMeta).toEqual({ service: PROGRAM_NAME });
        expect(getLogger().level).toBe('debug');
    });

    test('info and debug levels use different formats', () => {
        const createLoggerSpy = vi.spyOn(winston, 'createLogger');

        setLogLevel('info');
        setLogLevel('debug');

        const [[infoOptions], [debugOptions]] = createLoggerSpy.mock.calls;
        expect(infoOptions?.level).toBe('info');
        expect(debugOptions?.level).toBe('debug');
        expect(infoOptions?.format).not.toBe(debugOptions?.format);
    });

    test('every level is written to stderr', () => {
        setLogLevel('verbose');

        const [transport] = getLogger().transports;
        expect(transport).toBeInstanceOf(winston.transports.Console);
        if (transport instanceof winston.transports.Console) {
            expect(transport.stderrLevels).toEqual({ error: true, warn: true, info: true, verbose: true, debug: true, silly: true });
        }
    });
});
