import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { domainService, parseDomainInput } from '../services/domainService.js';
import { ConfigurationError, DomainExistsError, DomainNotFoundError } from '../services/errors.js';
import { __redisTestUtils } from '../services/redisService.js';

describe('DomainService', () => {
    let libraryDir: string;

    beforeEach(async () => {
        __redisTestUtils.resetMock();
        libraryDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wf-domain-'));
    });

    afterEach(async () => {
        await fs.rm(libraryDir, { recursive: true, force: true });
    });

    it('creates and reads back a domain', async () => {
        const created = await domainService.createDomain('geo', { persona: 'poet', name: 'Geography' });

        expect(created).toMatchObject({
            id: 'geo',
            name: 'Geography',
            description: '',
            persona: 'poet',
            enablePatternOverride: true,
        });
        expect(await domainService.getDomain('geo')).toEqual(created);
        expect(await domainService.hasDomain('geo')).toBe(true);
    });

    it('lists domain ids sorted', async () => {
        await domainService.createDomain('zeta', { persona: 'poet' });
        await domainService.createDomain('alpha', { persona: 'poet' });

        expect(await domainService.listDomains()).toEqual(['alpha', 'zeta']);
        expect((await domainService.getAllDomains()).map((d) => d.id)).toEqual(['alpha', 'zeta']);
    });

    it('defaults to the librarian persona, which needs a library path', async () => {
        await expect(domainService.createDomain('docs')).rejects.toMatchObject({
            name: 'ConfigurationError',
            field: 'library_base_path',
        });
        expect(await domainService.hasDomain('docs')).toBe(false);
    });

    it('rejects a library path that does not exist', async () => {
        await expect(
            domainService.createDomain('docs', { persona: 'librarian', libraryBasePath: path.join(libraryDir, 'missing') })
        ).rejects.toMatchObject({ field: 'library_base_path' });
    });

    it('accepts a librarian domain with an existing directory', async () => {
        const created = await domainService.createDomain('docs', { persona: 'librarian', libraryBasePath: libraryDir });
        expect(created.libraryBasePath).toBe(libraryDir);
    });

    it('stores and merges per-domain library caps', async () => {
        await domainService.createDomain('docs', {
            persona: 'librarian',
            libraryBasePath: libraryDir,
            maxLibraryDocuments: 10,
        });
        await domainService.updateDomain('docs', { maxCharsPerDocument: 200 });

        expect(await domainService.getDomain('docs')).toMatchObject({ maxLibraryDocuments: 10, maxCharsPerDocument: 200 });
    });

    it('rejects invalid ids', async () => {
        await expect(domainService.createDomain('../etc', { persona: 'poet' })).rejects.toMatchObject({
            field: 'domain_id',
        });
    });

    it('refuses to create a domain twice', async () => {
        await domainService.createDomain('geo', { persona: 'poet' });
        await expect(domainService.createDomain('geo', { persona: 'poet' })).rejects.toBeInstanceOf(DomainExistsError);
    });

    it('merges updates and re-validates the persona contract', async () => {
        await domainService.createDomain('geo', { persona: 'poet', description: 'maps' });

        await expect(domainService.updateDomain('geo', { persona: 'librarian' })).rejects.toMatchObject({
            field: 'library_base_path',
        });

        const updated = await domainService.updateDomain('geo', { persona: 'librarian', libraryBasePath: libraryDir });
        expect(updated).toMatchObject({ persona: 'librarian', libraryBasePath: libraryDir, description: 'maps' });
        expect((await domainService.getDomain('geo'))?.persona).toBe('librarian');
    });

    it('raises DomainNotFoundError when updating an unknown domain', async () => {
        await expect(domainService.updateDomain('missing', { name: 'x' })).rejects.toBeInstanceOf(DomainNotFoundError);
    });

    it('deletes a domain with its patterns', async () => {
        await domainService.createDomain('geo', { persona: 'poet' });
        await domainService.upsertPattern('geo', { id: 'p1', matcher: { kind: 'substring', text: 'a' }, answer: 'x' });

        expect(await domainService.deleteDomain('geo')).toBe(true);
        expect(await domainService.getDomain('geo')).toBeNull();
        expect(await domainService.listPatterns('geo')).toEqual([]);
        expect(await domainService.deleteDomain('geo')).toBe(false);
    });

    describe('patterns', () => {
        beforeEach(async () => {
            await domainService.createDomain('geo', { persona: 'poet' });
        });

        it('stores patterns sorted by id', async () => {
            await domainService.upsertPattern('geo', { id: 'p2', matcher: { kind: 'substring', text: 'b' }, answer: 'y' });
            await domainService.upsertPattern('geo', { id: 'p1', matcher: { kind: 'substring', text: 'a' }, answer: 'x' });

            expect((await domainService.listPatterns('geo')).map((p) => p.id)).toEqual(['p1', 'p2']);
        });

        it('counts usage separately from the pattern', async () => {
            await domainService.upsertPattern('geo', { id: 'p1', matcher: { kind: 'substring', text: 'a' }, answer: 'x' });

            expect(await domainService.recordPatternHit('geo', 'p1')).toBe(1);
            expect(await domainService.recordPatternHit('geo', 'p1')).toBe(2);

            const [pattern] = await domainService.listPatternsWithUsage('geo');
            expect(pattern).toEqual({
                id: 'p1',
                matcher: { kind: 'substring', text: 'a' },
                answer: 'x',
                usageCount: 2,
            });
        });

        it('deletes a pattern', async () => {
            await domainService.upsertPattern('geo', { id: 'p1', matcher: { kind: 'substring', text: 'a' }, answer: 'x' });

            expect(await domainService.deletePattern('geo', 'p1')).toBe(true);
            expect(await domainService.listPatterns('geo')).toEqual([]);
        });

        it('refuses patterns for unknown domains', async () => {
            await expect(
                domainService.upsertPattern('missing', { id: 'p1', matcher: { kind: 'substring', text: 'a' }, answer: 'x' })
            ).rejects.toBeInstanceOf(DomainNotFoundError);
        });
    });
});

describe('parseDomainInput', () => {
    it('accepts snake_case fields', () => {
        expect(
            parseDomainInput({
                domain_name: 'Docs',
                persona: 'Librarian',
                library_base_path: '/srv/docs',
                enable_pattern_override: false,
                library_extensions: ['.md'],
            })
        ).toEqual({
            name: 'Docs',
            persona: 'librarian',
            libraryBasePath: '/srv/docs',
            enablePatternOverride: false,
            libraryExtensions: ['.md'],
        });
    });

    it('accepts per-domain library caps in either spelling', () => {
        expect(parseDomainInput({ max_library_documents: 3, maxCharsPerDocument: 100 })).toEqual({
            maxLibraryDocuments: 3,
            maxCharsPerDocument: 100,
        });
    });

    it('rejects library caps that are not positive integers', () => {
        expect(() => parseDomainInput({ max_library_documents: 0 })).toThrow(
            'max_library_documents must be a positive integer'
        );
        expect(() => parseDomainInput({ max_chars_per_document: 2.5 })).toThrow(
            'max_chars_per_document must be a positive integer'
        );
        expect(() => parseDomainInput({ maxCharsPerDocument: '100' })).toThrow(ConfigurationError);
    });

    it('rejects a non-boolean override flag', () => {
        expect(() => parseDomainInput({ enable_pattern_override: 'yes' })).toThrow(
            'enable_pattern_override must be a boolean'
        );
    });

    it('rejects unknown personas', () => {
        expect(() => parseDomainInput({ persona: 'wizard' })).toThrow("Unknown persona 'wizard'");
    });
});
