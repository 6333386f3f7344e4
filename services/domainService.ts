import fs from 'fs/promises';
import type { DomainConfig, DomainInput, PatternEntry, PatternWithUsage, PersonaName } from '../types.js';
import { redisService } from './redisService.js';
import { loggerService } from './loggerService.js';
import { ConfigurationError, DomainExistsError, DomainNotFoundError } from './errors.js';
import { DEFAULT_PERSONA, isPersonaName, personaService } from './personaService.js';
import { isRecord, isStringArray, parsePatternEntry } from './patternStore.js';

// Redis Keys Configuration
const KEYS = {
  DOMAINS_SET: 'wf:domains',
  DOMAIN_PREFIX: 'wf:domain:', // e.g., wf:domain:cooking
};

const domainKey = (domainId: string) => `${KEYS.DOMAIN_PREFIX}${domainId}`;
const patternsKey = (domainId: string) => `${KEYS.DOMAIN_PREFIX}${domainId}:patterns`;
const usageKey = (domainId: string) => `${KEYS.DOMAIN_PREFIX}${domainId}:usage`;

const DOMAIN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

// Redis returns HGETALL as [field, value, ...] through `call`; ioredis helpers return an object.
const toHashRecord = (reply: unknown): Record<string, string> => {
  const record: Record<string, string> = {};
  if (Array.isArray(reply)) {
    for (let i = 0; i + 1 < reply.length; i += 2) {
      record[String(reply[i])] = String(reply[i + 1]);
    }
  } else if (isRecord(reply)) {
    for (const [field, value] of Object.entries(reply)) {
      record[field] = String(value);
    }
  }
  return record;
};

const readOptionalString = (raw: Record<string, unknown>, field: string, ...keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = raw[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') {
      throw new ConfigurationError(field, `${field} must be a string`);
    }
    return value;
  }
  return undefined;
};

const readOptionalPositiveInt = (raw: Record<string, unknown>, field: string, ...keys: string[]): number | undefined => {
  for (const key of keys) {
    const value = raw[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError(field, `${field} must be a positive integer`);
    }
    return value;
  }
  return undefined;
};

/**
 * Converts a wire or file payload into a domain update. Both `library_base_path`
 * and `libraryBasePath` spellings are accepted.
 */
export const parseDomainInput = (raw: unknown): DomainInput => {
  if (!isRecord(raw)) {
    throw new ConfigurationError('domain', 'Domain payload must be an object');
  }

  const input: DomainInput = {};

  const name = readOptionalString(raw, 'name', 'name', 'domain_name');
  if (name !== undefined) input.name = name;

  const description = readOptionalString(raw, 'description', 'description');
  if (description !== undefined) input.description = description;

  const persona = readOptionalString(raw, 'persona', 'persona');
  if (persona !== undefined) input.persona = personaService.getPersona(persona).name;

  const libraryBasePath = readOptionalString(raw, 'library_base_path', 'libraryBasePath', 'library_base_path');
  if (libraryBasePath !== undefined) input.libraryBasePath = libraryBasePath;

  const override = raw.enablePatternOverride ?? raw.enable_pattern_override;
  if (override !== undefined) {
    if (typeof override !== 'boolean') {
      throw new ConfigurationError('enable_pattern_override', 'enable_pattern_override must be a boolean');
    }
    input.enablePatternOverride = override;
  }

  const extensions = raw.libraryExtensions ?? raw.library_extensions;
  if (extensions !== undefined) {
    if (!isStringArray(extensions)) {
      throw new ConfigurationError('library_extensions', 'library_extensions must be an array of strings');
    }
    input.libraryExtensions = extensions;
  }

  const maxLibraryDocuments = readOptionalPositiveInt(raw, 'max_library_documents', 'maxLibraryDocuments', 'max_library_documents');
  if (maxLibraryDocuments !== undefined) input.maxLibraryDocuments = maxLibraryDocuments;

  const maxCharsPerDocument = readOptionalPositiveInt(raw, 'max_chars_per_document', 'maxCharsPerDocument', 'max_chars_per_document');
  if (maxCharsPerDocument !== undefined) input.maxCharsPerDocument = maxCharsPerDocument;

  return input;
};

/**
 * Enforces the persona/data-source contract: a library persona needs an existing
 * directory to read from.
 */
export const validateDomainConfig = async (config: DomainConfig): Promise<void> => {
  const persona = personaService.getPersona(config.persona);
  if (persona.dataSource !== 'library') return;

  const basePath = config.libraryBasePath?.trim();
  if (!basePath) {
    throw new ConfigurationError(
      'library_base_path',
      `Domain '${config.id}' uses persona '${persona.name}' which requires library_base_path`
    );
  }

  try {
    const stats = await fs.stat(basePath);
    if (!stats.isDirectory()) {
      throw new ConfigurationError('library_base_path', `library_base_path '${basePath}' is not a directory`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError('library_base_path', `library_base_path '${basePath}' does not exist`, { cause: error });
  }
};

const parseStoredDomain = (domainId: string, payload: unknown): DomainConfig | null => {
  if (typeof payload !== 'string') return null;
  try {
    const parsed: unknown = JSON.parse(payload);
    if (!isRecord(parsed) || typeof parsed.id !== 'string' || !isPersonaName(parsed.persona)) {
      loggerService.error('DomainService: Stored domain has an invalid shape', { domainId });
      return null;
    }
    const input = parseDomainInput(parsed);
    return {
      id: parsed.id,
      name: input.name ?? parsed.id,
      description: input.description ?? '',
      persona: parsed.persona,
      libraryBasePath: input.libraryBasePath,
      enablePatternOverride: input.enablePatternOverride ?? true,
      libraryExtensions: input.libraryExtensions,
      maxLibraryDocuments: input.maxLibraryDocuments,
      maxCharsPerDocument: input.maxCharsPerDocument,
      createdAt: typeof parsed.createdAt === 'string' ? parsed.createdAt : '',
      updatedAt: typeof parsed.updatedAt === 'string' ? parsed.updatedAt : '',
    };
  } catch (error) {
    loggerService.error(`DomainService: Failed to parse domain ${domainId}`, { error });
    return null;
  }
};

const parseStoredPatterns = (domainId: string, reply: unknown): PatternEntry[] => {
  const patterns: PatternEntry[] = [];
  for (const [patternId, payload] of Object.entries(toHashRecord(reply))) {
    try {
      patterns.push(parsePatternEntry(JSON.parse(payload), patternId));
    } catch (error) {
      loggerService.error('DomainService: Skipping unreadable pattern', { domainId, patternId, error });
    }
  }
  return patterns.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
};

const persistDomain = async (config: DomainConfig) => {
  await redisService.request(['SET', domainKey(config.id), JSON.stringify(config)]);
  await redisService.request(['SADD', KEYS.DOMAINS_SET, config.id]);
};

// --- Public API ---

export const domainService = {

  /**
   * Health Check
   */
  healthCheck: async (): Promise<boolean> => {
    return await redisService.healthCheck();
  },

  /**
   * Create a brand-new domain. Library personas are checked for a usable path up front.
   */
  createDomain: async (domainId: string, input: DomainInput = {}): Promise<DomainConfig> => {
    if (!DOMAIN_ID_PATTERN.test(domainId)) {
      throw new ConfigurationError('domain_id', `Invalid domain id '${domainId}'`);
    }
    if (await domainService.hasDomain(domainId)) {
      throw new DomainExistsError(domainId);
    }

    const now = new Date().toISOString();
    const persona: PersonaName = input.persona ?? DEFAULT_PERSONA;
    const config: DomainConfig = {
      id: domainId,
      name: input.name || domainId,
      description: input.description ?? '',
      persona,
      libraryBasePath: input.libraryBasePath,
      enablePatternOverride: input.enablePatternOverride ?? true,
      libraryExtensions: input.libraryExtensions,
      maxLibraryDocuments: input.maxLibraryDocuments,
      maxCharsPerDocument: input.maxCharsPerDocument,
      createdAt: now,
      updatedAt: now,
    };

    await validateDomainConfig(config);
    await persistDomain(config);
    loggerService.info('DomainService: Created domain', { domainId, persona });
    return config;
  },

  /**
   * Returns every domain id, sorted.
   */
  listDomains: async (): Promise<string[]> => {
    const result = await redisService.request(['SMEMBERS', KEYS.DOMAINS_SET]);
    return Array.isArray(result) ? result.map(String).sort() : [];
  },

  getAllDomains: async (): Promise<DomainConfig[]> => {
    const ids = await domainService.listDomains();
    const domains = await Promise.all(ids.map((id) => domainService.getDomain(id)));
    return domains.filter((domain): domain is DomainConfig => domain !== null);
  },

  hasDomain: async (domainId: string): Promise<boolean> => {
    const exists = await redisService.request(['EXISTS', domainKey(domainId)]);
    return exists === 1;
  },

  getDomain: async (domainId: string): Promise<DomainConfig | null> => {
    const data = await redisService.request(['GET', domainKey(domainId)]);
    if (!data) return null;
    return parseStoredDomain(domainId, data);
  },

  /**
   * Applies a partial update. The merged configuration must still satisfy the
   * persona's data-source requirements.
   */
  updateDomain: async (domainId: string, input: DomainInput): Promise<DomainConfig> => {
    const existing = await domainService.getDomain(domainId);
    if (!existing) {
      throw new DomainNotFoundError(domainId);
    }

    const updated: DomainConfig = {
      ...existing,
      name: input.name ?? existing.name,
      description: input.description ?? existing.description,
      persona: input.persona ?? existing.persona,
      libraryBasePath: input.libraryBasePath ?? existing.libraryBasePath,
      enablePatternOverride: input.enablePatternOverride ?? existing.enablePatternOverride,
      libraryExtensions: input.libraryExtensions ?? existing.libraryExtensions,
      maxLibraryDocuments: input.maxLibraryDocuments ?? existing.maxLibraryDocuments,
      maxCharsPerDocument: input.maxCharsPerDocument ?? existing.maxCharsPerDocument,
      updatedAt: new Date().toISOString(),
    };

    await validateDomainConfig(updated);
    await persistDomain(updated);
    loggerService.info('DomainService: Updated domain', { domainId });
    return updated;
  },

  /**
   * Removes a domain together with its patterns and usage counters.
   */
  deleteDomain: async (domainId: string): Promise<boolean> => {
    const removed = await redisService.request(['SREM', KEYS.DOMAINS_SET, domainId]);
    await redisService.request(['DEL', domainKey(domainId), patternsKey(domainId), usageKey(domainId)]);
    return removed === 1;
  },

  listPatterns: async (domainId: string): Promise<PatternEntry[]> => {
    const reply = await redisService.request(['HGETALL', patternsKey(domainId)]);
    return parseStoredPatterns(domainId, reply);
  },

  listPatternsWithUsage: async (domainId: string): Promise<PatternWithUsage[]> => {
    const [patterns, usageReply] = await Promise.all([
      domainService.listPatterns(domainId),
      redisService.request(['HGETALL', usageKey(domainId)]),
    ]);
    const usage = toHashRecord(usageReply);
    return patterns.map((pattern) => ({
      ...pattern,
      usageCount: Number.parseInt(usage[pattern.id] ?? '0', 10) || 0,
    }));
  },

  upsertPattern: async (domainId: string, pattern: PatternEntry): Promise<PatternEntry> => {
    if (!(await domainService.hasDomain(domainId))) {
      throw new DomainNotFoundError(domainId);
    }
    await redisService.request(['HSET', patternsKey(domainId), pattern.id, JSON.stringify(pattern)]);
    return pattern;
  },

  deletePattern: async (domainId: string, patternId: string): Promise<boolean> => {
    const removed = await redisService.request(['HDEL', patternsKey(domainId), patternId]);
    await redisService.request(['HDEL', usageKey(domainId), patternId]);
    return removed === 1;
  },

  /**
   * Usage counters live outside the pattern hash so lookups never wait on this write.
   */
  recordPatternHit: async (domainId: string, patternId: string): Promise<number> => {
    const count = await redisService.request(['HINCRBY', usageKey(domainId), patternId, 1]);
    return typeof count === 'number' ? count : Number(count);
  },
};
