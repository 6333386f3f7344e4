import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { isExcluded, loadExclusionRules, parseExclusionRules } from '../services/exclusionService.js';
import { PathError } from '../services/errors.js';

describe('isExcluded', () => {
    it('matches a rule against the file name', () => {
        expect(isExcluded('.env', ['.env'])).toBe(true);
        expect(isExcluded('config/.env.local', ['.env'])).toBe(true);
    });

    it('matches a rule against the full relative path', () => {
        expect(isExcluded('secrets/notes.md', ['secrets/'])).toBe(true);
    });

    it('keeps paths that no rule touches', () => {
        expect(isExcluded('notes.md', ['.env'])).toBe(false);
        expect(isExcluded('notes.md', [])).toBe(false);
    });

    it('is case-sensitive', () => {
        expect(isExcluded('README.md', ['readme'])).toBe(false);
    });

    it('ignores blank rules', () => {
        expect(isExcluded('a.md', ['', '   '])).toBe(false);
    });

    it('excludes paths it cannot interpret', () => {
        expect(isExcluded('', [])).toBe(true);
        expect(isExcluded('bad\0name.md', [])).toBe(true);
        expect(isExcluded('/', [])).toBe(true);
    });
});

describe('parseExclusionRules', () => {
    it('drops comments and blank lines and trims each rule', () => {
        expect(parseExclusionRules('# secrets\n\n.env\n  private  \r\nkeys/')).toEqual(['.env', 'private', 'keys/']);
    });
});

describe('loadExclusionRules', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wf-rules-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('returns no rules for a missing file', async () => {
        expect(await loadExclusionRules(path.join(dir, 'missing.md'))).toEqual([]);
    });

    it('reads one rule per line', async () => {
        const file = path.join(dir, 'ignored.md');
        await fs.writeFile(file, '.env\nid_rsa\n');
        expect(await loadExclusionRules(file)).toEqual(['.env', 'id_rsa']);
    });

    it('raises PathError when the rule file cannot be read', async () => {
        await expect(loadExclusionRules(dir)).rejects.toBeInstanceOf(PathError);
    });
});
