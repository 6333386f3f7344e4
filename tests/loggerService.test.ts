import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loggerService } from '../services/loggerService.js';

describe('LoggerService', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.stubEnv('LOG_LEVEL', 'info');
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
    });

    it('writes info lines with level, message and metadata', () => {
        loggerService.info('Loaded domain', { domainId: 'geo' });

        expect(console.log).toHaveBeenCalledTimes(1);
        expect(vi.mocked(console.log).mock.calls[0][0]).toMatch(
            /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] Loaded domain \{"domainId":"geo"\}$/
        );
    });

    it('suppresses messages below the configured level', () => {
        loggerService.debug('hidden');
        expect(console.log).not.toHaveBeenCalled();

        vi.stubEnv('LOG_LEVEL', 'debug');
        loggerService.debug('shown');
        expect(console.log).toHaveBeenCalledTimes(1);
    });

    it('routes warnings and errors to their console streams', () => {
        loggerService.warn('careful');
        loggerService.error('boom', { error: new Error('bad') });

        expect(vi.mocked(console.warn).mock.calls[0][0]).toMatch(/\[WARN\] careful$/);
        expect(vi.mocked(console.error).mock.calls[0][0]).toMatch(
            /\[ERROR\] boom \{"error":\{"name":"Error","message":"bad"\}\}$/
        );
    });
});
