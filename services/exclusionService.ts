import fs from 'fs/promises';
import { PathError } from './errors.js';

/**
 * A path is excluded when any rule occurs in the full path or in its last segment.
 * Paths that cannot be interpreted are always excluded.
 */
export const isExcluded = (path: string, rules: readonly string[]): boolean => {
    if (typeof path !== 'string' || path.length === 0 || path.includes('\0')) return true;

    const segments = path.split(/[\\/]/).filter((segment) => segment.length > 0);
    const fileName = segments.length > 0 ? segments[segments.length - 1] : '';
    if (!fileName) return true;

    return rules.some((rule) => {
        const trimmed = rule.trim();
        if (!trimmed) return false;
        return path.includes(trimmed) || fileName.includes(trimmed);
    });
};

/**
 * One rule per line; blank lines and `#` comments are skipped.
 */
export const parseExclusionRules = (text: string): string[] =>
    text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'));

const isNotFound = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads a rule document. A missing document means no rules; any other read
 * failure is raised so a broken block-list never silently lets files through.
 */
export const loadExclusionRules = async (filePath: string): Promise<string[]> => {
    try {
        const text = await fs.readFile(filePath, 'utf8');
        return parseExclusionRules(text);
    } catch (error) {
        if (isNotFound(error)) return [];
        throw new PathError(filePath, `Unable to read exclusion rules from '${filePath}'`, { cause: error });
    }
};

