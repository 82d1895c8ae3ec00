import { afterEach, describe, expect, it, vi } from 'vitest';
import { KafkaApiError } from './error';
import { log, LogLevel, setLogLevel } from './logger';

describe('Logger', () => {
    afterEach(() => {
        setLogLevel(LogLevel.INFO);
    });

    it('writes one JSON line per event', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});

        log.info('Reassignments', { topic: 'orders', assignments: { 0: [1, 3] } });

        expect(info).toHaveBeenCalledWith(
            '{"message":"Reassignments","metadata":{"topic":"orders","assignments":{"0":[1,3]}},"level":"info"}',
        );
    });

    it('skips events below the log level', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

        log.debug('Broker ordering');
        setLogLevel(LogLevel.DEBUG);
        log.debug('Broker ordering');
        setLogLevel(LogLevel.ERROR);
        log.warn('Partition orders-0 reported an error');

        expect(debug).toHaveBeenCalledTimes(1);
        expect(warn).not.toHaveBeenCalled();
    });

    it('serializes errors with their own properties', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});

        log.error('Failed', { error: new KafkaApiError(39, null, null) });

        const [line] = error.mock.calls[0];
        expect(JSON.parse(String(line)).metadata.error).toMatchObject({
            errorCode: 39,
            errorMessage: null,
            message: 'INVALID_REPLICA_ASSIGNMENT',
            name: 'KafkaApiError',
        });
    });
});
