import { describe, it, expect, afterEach, vi } from 'vitest';
import { settingsService } from '../services/settingsService.js';

describe('SettingsService', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('uses library defaults when nothing is configured', () => {
        vi.stubEnv('LIBRARY_MAX_DOCUMENTS', '');
        vi.stubEnv('LIBRARY_MAX_CHARS_PER_DOCUMENT', '');
        vi.stubEnv('LIBRARY_MAX_SCAN_ENTRIES', '');
        vi.stubEnv('LIBRARY_LOAD_TIMEOUT_MS', '');
        vi.stubEnv('LIBRARY_IGNORE_FILE', '');
        vi.stubEnv('EXCLUSION_RULES_PATH', '');

        expect(settingsService.getLibrarySettings()).toEqual({
            maxDocuments: 50,
            maxCharsPerDocument: 50000,
            maxScanEntries: 10000,
            timeoutMs: 10000,
            ignoreFileName: 'ignored.md',
            exclusionRulesPath: '',
        });
    });

    it('reads overrides from the environment', () => {
        vi.stubEnv('LIBRARY_MAX_DOCUMENTS', '5');
        vi.stubEnv('EXCLUSION_RULES_PATH', '/etc/wayfinder/ignored.md');

        const settings = settingsService.getLibrarySettings();
        expect(settings.maxDocuments).toBe(5);
        expect(settings.exclusionRulesPath).toBe('/etc/wayfinder/ignored.md');
    });

    it('falls back on invalid numbers', () => {
        vi.stubEnv('LIBRARY_MAX_DOCUMENTS', '-3');
        vi.stubEnv('PORT', 'abc');

        expect(settingsService.getLibrarySettings().maxDocuments).toBe(50);
        expect(settingsService.getPort()).toBe(3001);
    });

    it('reads inference settings', () => {
        vi.stubEnv('INFERENCE_ENDPOINT', '');
        vi.stubEnv('INFERENCE_MODEL', 'local-model');
        vi.stubEnv('INFERENCE_TEMPERATURE', '0');

        expect(settingsService.getInferenceSettings()).toEqual({
            endpoint: 'http://localhost:1234/v1',
            model: 'local-model',
            temperature: 0,
        });
    });

    it('accepts either search key variable', () => {
        vi.stubEnv('GOOGLE_API_KEY', '');
        vi.stubEnv('GOOGLE_CUSTOM_SEARCH_KEY', 'test-key');

        expect(settingsService.getSearchSettings().apiKey).toBe('test-key');
    });
});
