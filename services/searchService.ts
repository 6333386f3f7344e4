import { SearchUnavailable } from './errors.js';
import { isRecord } from './patternStore.js';
import { loggerService } from './loggerService.js';
import { settingsService } from './settingsService.js';

export interface SearchProvider {
    /** Resolves to context text for the model; rejects with `SearchUnavailable`. */
    search(query: string, signal?: AbortSignal): Promise<string>;
}

export interface SearchHit {
    title: string;
    snippet: string;
    url: string;
}

const SEARCH_URL = 'https://customsearch.googleapis.com/customsearch/v1';

const toHit = (item: unknown): SearchHit | null => {
    if (!isRecord(item)) return null;
    const title = typeof item.title === 'string' ? item.title : 'Untitled';
    const snippet = typeof item.snippet === 'string' ? item.snippet : '';
    const url = typeof item.link === 'string' ? item.link : '';
    return url || snippet ? { title, snippet, url } : null;
};

export const formatSearchHits = (hits: SearchHit[]): string =>
    hits.map((hit, i) => `[Source ${i + 1}] ${hit.title}\n${hit.url}\n${hit.snippet}`).join('\n\n');

export const searchService: SearchProvider = {
    search: async (query, signal) => {
        const { apiKey, searchEngineId, resultCount } = settingsService.getSearchSettings();

        if (!apiKey) {
            throw new SearchUnavailable('Google Custom Search failed: Missing GOOGLE_API_KEY environment variable.');
        }
        if (!searchEngineId) {
            throw new SearchUnavailable('Google Custom Search failed: Missing search engine ID (set GOOGLE_CSE_ID).');
        }

        const searchUrl = new URL(SEARCH_URL);
        searchUrl.searchParams.set('key', apiKey);
        searchUrl.searchParams.set('cx', searchEngineId);
        searchUrl.searchParams.set('q', query);
        searchUrl.searchParams.set('num', String(resultCount));

        let response: Response;
        try {
            response = await fetch(searchUrl.toString(), {
                headers: { Accept: 'application/json' },
                signal,
            });
        } catch (error) {
            signal?.throwIfAborted();
            throw new SearchUnavailable(`Google Custom Search failed: ${String(error)}`, { cause: error });
        }

        if (!response.ok) {
            throw new SearchUnavailable(`Google Custom Search failed: HTTP ${response.status}`);
        }

        const bodyText = await response.text();
        let json: unknown;
        try {
            json = JSON.parse(bodyText);
        } catch (parseError) {
            throw new SearchUnavailable(`Google Custom Search failed: Invalid JSON (${String(parseError)})`, { cause: parseError });
        }

        const items = isRecord(json) && Array.isArray(json.items) ? json.items : [];
        const hits = items.map(toHit).filter((hit): hit is SearchHit => hit !== null);

        loggerService.info('Web Search Response', {
            query,
            status: response.status,
            content_length: bodyText.length,
            result_count: hits.length,
        });

        return formatSearchHits(hits);
    },
};
