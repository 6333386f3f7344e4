import fs from 'fs/promises';
import path from 'path';
import type { DomainConfig, PatternEntry } from '../types.js';
import { domainService, parseDomainInput } from './domainService.js';
import { ConfigurationError } from './errors.js';
import { loggerService } from './loggerService.js';
import { isRecord, parsePatternEntry } from './patternStore.js';

export interface DomainImportResult {
    imported: { domainId: string; patterns: number; created: boolean }[];
    failed: { domainId: string; error: string }[];
}

const readJson = async (filePath: string): Promise<unknown> => JSON.parse(await fs.readFile(filePath, 'utf8'));

const fileExists = async (filePath: string): Promise<boolean> => {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
};

const readPatterns = async (dir: string): Promise<PatternEntry[]> => {
    const file = path.join(dir, 'patterns.json');
    if (!(await fileExists(file))) return [];
    const data = await readJson(file);
    const list = Array.isArray(data) ? data : isRecord(data) && Array.isArray(data.patterns) ? data.patterns : null;
    if (!list) {
        throw new ConfigurationError('patterns', `Unexpected patterns format in ${file}`);
    }
    return list.map((raw, index) => parsePatternEntry(raw, `pattern-${index + 1}`));
};

const importDomain = async (dir: string, fallbackId: string) => {
    const raw = await readJson(path.join(dir, 'domain.json'));
    const input = parseDomainInput(raw);
    const domainId = isRecord(raw) && typeof raw.domain_id === 'string' && raw.domain_id.trim()
        ? raw.domain_id.trim()
        : fallbackId;

    // Patterns are validated before anything is written so a bad file leaves the store untouched
    const patterns = await readPatterns(dir);
    const seen = new Set<string>();
    for (const pattern of patterns) {
        if (seen.has(pattern.id)) {
            throw new ConfigurationError('patterns', `Duplicate pattern id '${pattern.id}'`);
        }
        seen.add(pattern.id);
    }

    const exists = await domainService.hasDomain(domainId);
    const config: DomainConfig = exists
        ? await domainService.updateDomain(domainId, input)
        : await domainService.createDomain(domainId, input);

    for (const pattern of patterns) {
        await domainService.upsertPattern(config.id, pattern);
    }
    return { domainId: config.id, patterns: patterns.length, created: !exists };
};

export const domainImportService = {
    /**
     * Imports every `<root>/<dir>/domain.json` (with optional `patterns.json`).
     * A broken domain is reported and skipped; the others still import.
     */
    importDirectory: async (root: string): Promise<DomainImportResult> => {
        const result: DomainImportResult = { imported: [], failed: [] };
        const entries = await fs.readdir(root, { withFileTypes: true });
        const dirs = entries
            .filter((entry) => entry.isDirectory())
            .map((entry) => entry.name)
            .sort();

        for (const name of dirs) {
            const dir = path.join(root, name);
            if (!(await fileExists(path.join(dir, 'domain.json')))) continue;

            try {
                const imported = await importDomain(dir, name);
                result.imported.push(imported);
                loggerService.info('DomainImportService: Imported domain', imported);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                result.failed.push({ domainId: name, error: message });
                loggerService.error('DomainImportService: Failed to import domain', { domainId: name, error });
            }
        }

        return result;
    },
};
