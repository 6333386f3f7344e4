import type { PatternEntry, PatternMatch, PatternMatcher } from '../types.js';
import { ConfigurationError } from './errors.js';

/** Case-folds, trims and collapses internal whitespace. */
export const normalizeText = (text: string): string => text.toLowerCase().trim().replace(/\s+/g, ' ');

interface CompiledPattern {
    id: string;
    answer: string;
    terms: string[];
}

const compileMatcher = (matcher: PatternMatcher): string[] => {
    if (matcher.kind === 'substring') {
        const text = normalizeText(matcher.text);
        return text ? [text] : [];
    }
    return matcher.keywords.map(normalizeText).filter((keyword) => keyword.length > 0);
};

const compareIds = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Read-only matcher index for one domain. Matching is evaluated against every
 * pattern, so the result does not depend on insertion order: the longest matched
 * text wins and equal lengths fall back to the lowest id.
 */
export class PatternStore {
    private readonly patterns: readonly CompiledPattern[];

    constructor(entries: readonly PatternEntry[]) {
        const seen = new Set<string>();
        const compiled: CompiledPattern[] = [];

        for (const entry of entries) {
            if (seen.has(entry.id)) {
                throw new ConfigurationError('patterns', `Duplicate pattern id '${entry.id}'`);
            }
            seen.add(entry.id);

            const terms = compileMatcher(entry.matcher);
            if (terms.length === 0) {
                throw new ConfigurationError('patterns', `Pattern '${entry.id}' has an empty matcher`);
            }
            compiled.push({ id: entry.id, answer: entry.answer, terms });
        }

        this.patterns = compiled.sort((a, b) => compareIds(a.id, b.id));
    }

    get size(): number {
        return this.patterns.length;
    }

    lookup(query: string): PatternMatch | null {
        const normalized = normalizeText(query);
        let best: PatternMatch | null = null;

        // Patterns are sorted by id, so a strictly-greater check keeps the lowest id on ties
        for (const pattern of this.patterns) {
            if (!pattern.terms.every((term) => normalized.includes(term))) continue;
            const matchedLength = pattern.terms.reduce((sum, term) => sum + term.length, 0);
            if (!best || matchedLength > best.matchedLength) {
                best = { patternId: pattern.id, answer: pattern.answer, matchedLength };
            }
        }

        return best;
    }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const isStringArray = (value: unknown): value is string[] =>
    Array.isArray(value) && value.every((item) => typeof item === 'string');

const parseMatcher = (raw: unknown, id: string): PatternMatcher => {
    if (typeof raw === 'string') return { kind: 'substring', text: raw };
    if (isRecord(raw)) {
        if (typeof raw.text === 'string' && (raw.kind === undefined || raw.kind === 'substring')) {
            return { kind: 'substring', text: raw.text };
        }
        if (isStringArray(raw.keywords) && (raw.kind === undefined || raw.kind === 'keywords')) {
            return { kind: 'keywords', keywords: raw.keywords };
        }
    }
    throw new ConfigurationError('patterns', `Pattern '${id}' needs a matcher: a string, { text } or { keywords: [] }`);
};

/**
 * Validates a pattern as stored or imported. `match` and `solution` are accepted
 * as aliases of `matcher` and `answer`.
 */
export const parsePatternEntry = (raw: unknown, fallbackId?: string): PatternEntry => {
    if (!isRecord(raw)) {
        throw new ConfigurationError('patterns', 'Pattern must be an object');
    }

    const id = typeof raw.id === 'string' && raw.id.trim() ? raw.id.trim() : fallbackId;
    if (!id) {
        throw new ConfigurationError('patterns', 'Pattern id is required');
    }

    const answer = typeof raw.answer === 'string' ? raw.answer : raw.solution;
    if (typeof answer !== 'string') {
        throw new ConfigurationError('patterns', `Pattern '${id}' needs an answer string`);
    }

    const matcher = parseMatcher(raw.matcher ?? raw.match, id);
    if (compileMatcher(matcher).length === 0) {
        throw new ConfigurationError('patterns', `Pattern '${id}' has an empty matcher`);
    }

    const entry: PatternEntry = { id, matcher, answer };
    if (typeof raw.name === 'string') entry.name = raw.name;
    if (isStringArray(raw.tags)) entry.tags = raw.tags;
    return entry;
};
