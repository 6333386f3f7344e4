export interface LibrarySettings {
  maxDocuments: number;
  maxCharsPerDocument: number;
  maxScanEntries: number;
  timeoutMs: number;
  ignoreFileName: string;
  exclusionRulesPath: string;
}

export interface InferenceSettings {
  endpoint: string;
  model: string;
  temperature: number;
}

export interface SearchSettings {
  apiKey: string;
  searchEngineId: string;
  resultCount: number;
}

export interface RedisSettings {
  redisUrl: string;
}

const DEFAULTS = {
  PORT: 3001,
  MAX_DOCUMENTS: 50,
  MAX_CHARS_PER_DOCUMENT: 50_000,
  MAX_SCAN_ENTRIES: 10_000,
  LOAD_TIMEOUT_MS: 10_000,
  IGNORE_FILE: 'ignored.md',
  INFERENCE_ENDPOINT: 'http://localhost:1234/v1',
  INFERENCE_MODEL: 'openai/gpt-oss-20b',
  TEMPERATURE: 0.7,
  SEARCH_RESULTS: 5,
  REDIS_URL: 'redis://localhost:6379',
};

const readPositiveInt = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readNumber = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
};

// Values are read from process.env on every call so tests and .env reloads see changes.
export const settingsService = {
  getPort: (): number => readPositiveInt('PORT', DEFAULTS.PORT),

  getApiKey: (): string => process.env.API_KEY || '',

  getDomainsPath: (): string => process.env.DOMAINS_PATH || '',

  getLibrarySettings: (): LibrarySettings => ({
    maxDocuments: readPositiveInt('LIBRARY_MAX_DOCUMENTS', DEFAULTS.MAX_DOCUMENTS),
    maxCharsPerDocument: readPositiveInt('LIBRARY_MAX_CHARS_PER_DOCUMENT', DEFAULTS.MAX_CHARS_PER_DOCUMENT),
    maxScanEntries: readPositiveInt('LIBRARY_MAX_SCAN_ENTRIES', DEFAULTS.MAX_SCAN_ENTRIES),
    timeoutMs: readPositiveInt('LIBRARY_LOAD_TIMEOUT_MS', DEFAULTS.LOAD_TIMEOUT_MS),
    ignoreFileName: process.env.LIBRARY_IGNORE_FILE || DEFAULTS.IGNORE_FILE,
    exclusionRulesPath: process.env.EXCLUSION_RULES_PATH || '',
  }),

  getInferenceSettings: (): InferenceSettings => ({
    endpoint: process.env.INFERENCE_ENDPOINT || DEFAULTS.INFERENCE_ENDPOINT,
    model: process.env.INFERENCE_MODEL || DEFAULTS.INFERENCE_MODEL,
    temperature: readNumber('INFERENCE_TEMPERATURE', DEFAULTS.TEMPERATURE),
  }),

  getSearchSettings: (): SearchSettings => ({
    apiKey: process.env.GOOGLE_API_KEY || process.env.GOOGLE_CUSTOM_SEARCH_KEY || '',
    searchEngineId: process.env.GOOGLE_CSE_ID || process.env.GOOGLE_SEARCH_ENGINE_ID || '',
    resultCount: readPositiveInt('SEARCH_RESULT_COUNT', DEFAULTS.SEARCH_RESULTS),
  }),

  getRedisSettings: (): RedisSettings => ({
    redisUrl: process.env.REDIS_URL || DEFAULTS.REDIS_URL,
  }),
};
