import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import type { LoadedDocument } from '../types.js';
import { isExcluded, loadExclusionRules } from './exclusionService.js';
import { LoadTimeout, PathError } from './errors.js';
import { loggerService } from './loggerService.js';
import { settingsService } from './settingsService.js';

export interface LoadOptions {
    maxDocuments?: number;
    maxCharsPerDocument?: number;
    /** Hard ceiling on directory entries examined, whatever the document caps. */
    maxScanEntries?: number;
    timeoutMs?: number;
    /** Rules applied on top of the global rule file and the library's own ignore file. */
    rules?: string[];
    ignoreFileName?: string;
    exclusionRulesPath?: string;
    /** Allow-list such as ['.md']; every file is eligible when omitted. */
    extensions?: string[];
    signal?: AbortSignal;
}

interface WalkState {
    root: string;
    rules: string[];
    ignoreFileName: string;
    extensions: Set<string> | null;
    maxDocuments: number;
    maxCharsPerDocument: number;
    maxScanEntries: number;
    scanned: number;
    visitedDirs: Set<string>;
    documents: LoadedDocument[];
    signal: AbortSignal;
}

// Ordinal comparison keeps the order independent of the host locale.
const compareNames = (a: Dirent, b: Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

const normalizeExtensions = (extensions?: string[]): Set<string> | null => {
    if (!extensions || extensions.length === 0) return null;
    return new Set(
        extensions
            .map((ext) => ext.trim().toLowerCase())
            .filter((ext) => ext.length > 0)
            .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`))
    );
};

const readPrefix = async (filePath: string, maxChars: number): Promise<{ content: string; truncated: boolean }> => {
    const handle = await fs.open(filePath, 'r');
    try {
        const { size } = await handle.stat();
        // Four bytes per UTF-16 unit is an upper bound, plus slack for a split sequence at the end
        const length = Math.min(size, maxChars * 4 + 4);
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, 0);
        const text = buffer.subarray(0, bytesRead).toString('utf8');
        const truncated = text.length > maxChars || size > bytesRead;
        return { content: truncated ? text.slice(0, maxChars) : text, truncated };
    } finally {
        await handle.close();
    }
};

const resolveKind = async (absPath: string, entry: Dirent): Promise<'file' | 'directory' | null> => {
    if (entry.isFile()) return 'file';
    if (entry.isDirectory()) return 'directory';
    if (!entry.isSymbolicLink()) return null;
    try {
        const target = await fs.stat(absPath);
        if (target.isFile()) return 'file';
        if (target.isDirectory()) return 'directory';
        return null;
    } catch {
        // Dangling link: treated as excluded
        return null;
    }
};

const isFull = (state: WalkState) => state.documents.length >= state.maxDocuments;

const walk = async (state: WalkState, dirAbs: string, relPrefix: string): Promise<void> => {
    state.signal.throwIfAborted();

    let entries: Dirent[];
    try {
        entries = await fs.readdir(dirAbs, { withFileTypes: true });
    } catch (error) {
        if (!relPrefix) {
            throw new PathError(state.root, `Library path '${state.root}' is not readable`, { cause: error });
        }
        loggerService.debug('LibraryService: Skipping unreadable directory', { dir: relPrefix });
        return;
    }

    entries.sort(compareNames);

    for (const entry of entries) {
        if (isFull(state)) return;
        state.signal.throwIfAborted();

        state.scanned += 1;
        if (state.scanned > state.maxScanEntries) {
            throw new PathError(state.root, `Library scan under '${state.root}' exceeded ${state.maxScanEntries} entries`);
        }

        const relPath = relPrefix ? `${relPrefix}/${entry.name}` : entry.name;
        if (!relPrefix && entry.name === state.ignoreFileName) continue;
        if (isExcluded(relPath, state.rules)) continue;

        const absPath = path.join(dirAbs, entry.name);
        const kind = await resolveKind(absPath, entry);

        if (kind === 'directory') {
            let realDir: string;
            try {
                realDir = await fs.realpath(absPath);
            } catch {
                continue;
            }
            if (state.visitedDirs.has(realDir)) continue;
            state.visitedDirs.add(realDir);
            await walk(state, absPath, relPath);
            continue;
        }

        if (kind !== 'file') continue;
        if (state.extensions && !state.extensions.has(path.extname(entry.name).toLowerCase())) continue;

        try {
            const { content, truncated } = await readPrefix(absPath, state.maxCharsPerDocument);
            state.documents.push({ id: relPath, path: absPath, name: entry.name, content, truncated });
        } catch (error) {
            loggerService.debug('LibraryService: Skipping unreadable file', { file: relPath, error });
        }
    }
};

const assertDirectory = async (basePath: string): Promise<string> => {
    if (!basePath || !basePath.trim()) {
        throw new PathError(basePath, 'Library path is empty');
    }
    try {
        const stats = await fs.stat(basePath);
        if (!stats.isDirectory()) {
            throw new PathError(basePath, `Library path '${basePath}' is not a directory`);
        }
        return await fs.realpath(basePath);
    } catch (error) {
        if (error instanceof PathError) throw error;
        throw new PathError(basePath, `Library path '${basePath}' does not exist or is not accessible`, { cause: error });
    }
};

const collectRules = async (basePath: string, ignoreFileName: string, globalRulesPath: string, extra: string[]) => {
    const globalRules = globalRulesPath ? await loadExclusionRules(globalRulesPath) : [];
    const libraryRules = await loadExclusionRules(path.join(basePath, ignoreFileName));
    return [...globalRules, ...libraryRules, ...extra];
};

/**
 * Loads up to `maxDocuments` files under `basePath`, depth-first in ordinal name
 * order, skipping anything matched by the exclusion rules. Files beyond the cap
 * are never opened. Rejects with `PathError` for an unusable base path or a scan
 * that exceeds `maxScanEntries`, with `LoadTimeout` past `timeoutMs`, and with
 * the abort reason when `signal` fires.
 */
export const loadDocuments = async (basePath: string, options: LoadOptions = {}): Promise<LoadedDocument[]> => {
    const defaults = settingsService.getLibrarySettings();
    const timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
    options.signal?.throwIfAborted();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new LoadTimeout(basePath, timeoutMs)), timeoutMs);
    const onCallerAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const run = async (): Promise<LoadedDocument[]> => {
        const root = await assertDirectory(basePath);
        const ignoreFileName = options.ignoreFileName ?? defaults.ignoreFileName;
        const state: WalkState = {
            root,
            rules: await collectRules(
                root,
                ignoreFileName,
                options.exclusionRulesPath ?? defaults.exclusionRulesPath,
                options.rules ?? []
            ),
            ignoreFileName,
            extensions: normalizeExtensions(options.extensions),
            maxDocuments: options.maxDocuments ?? defaults.maxDocuments,
            maxCharsPerDocument: options.maxCharsPerDocument ?? defaults.maxCharsPerDocument,
            maxScanEntries: options.maxScanEntries ?? defaults.maxScanEntries,
            scanned: 0,
            visitedDirs: new Set([root]),
            documents: [],
            signal: controller.signal,
        };
        await walk(state, root, '');
        return state.documents;
    };

    try {
        // Racing the abort keeps a stalled fs call from holding the query past the deadline
        return await new Promise<LoadedDocument[]>((resolve, reject) => {
            controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
            run().then(resolve, reject);
        });
    } finally {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onCallerAbort);
    }
};

export const libraryService = {
    loadDocuments,
};
