import { QueryState } from '../types.js';
import type { LoadedDocument, PatternMatch, QueryRequest, QueryResult, SourceUsed } from '../types.js';
import type { DomainSnapshot } from './domainRegistry.js';
import { ConfigurationError, PathError } from './errors.js';
import type { LoadOptions } from './libraryService.js';
import { loggerService } from './loggerService.js';
import type { ModelInvoker } from './inferenceService.js';
import type { SearchProvider } from './searchService.js';

export interface QueryProcessorDeps {
    registry: { get(domainId: string): Promise<DomainSnapshot> };
    loadDocuments: (basePath: string, options: LoadOptions) => Promise<LoadedDocument[]>;
    search: SearchProvider;
    model: ModelInvoker;
    /** Usage write path; runs after the result is assembled and never delays it. */
    recordPatternHit?: (domainId: string, patternId: string) => Promise<unknown>;
}

interface Retrieval {
    context: string;
    sourceUsed: SourceUsed;
    documents: string[];
    truncatedDocuments: string[];
    degradedFrom?: 'internet';
}

const emptyRetrieval = (sourceUsed: SourceUsed): Retrieval => ({
    context: '',
    sourceUsed,
    documents: [],
    truncatedDocuments: [],
});

export const formatLibraryContext = (documents: LoadedDocument[]): string => {
    if (documents.length === 0) return '';
    const body = documents.map((doc) => `**Document: ${doc.id}**\n${doc.content}`).join('\n\n');
    return `Library documents:\n\n${body}`;
};

/**
 * Routes one query through pattern lookup or the persona's data source.
 *
 *   START -> PATTERN_CHECK -> PATTERN_HIT ----------------------------> DONE
 *                          \-> FALLBACK -> DATA_SOURCE_DISPATCH -----> DONE
 *
 * A pattern hit is final: no retrieval and no model call. The processor keeps
 * nothing between calls; domains come from the injected registry.
 */
export class QueryProcessor {
    constructor(private readonly deps: QueryProcessorDeps) {}

    async process(request: QueryRequest): Promise<QueryResult> {
        const startedMs = Date.now();
        const startedAt = new Date(startedMs).toISOString();
        const { signal } = request;

        const snapshot = await this.deps.registry.get(request.domainId);
        const { config, persona, patterns } = snapshot;
        const trace = persona.trace ? loggerService.info : loggerService.debug;

        const states: QueryState[] = [];
        let state: QueryState = QueryState.START;
        let searchPatterns = false;
        let hit: PatternMatch | null = null;
        let retrieval = emptyRetrieval(persona.dataSource);
        let answer = '';
        let reasoning: string | undefined;

        // Thinking visibility never feeds back into retrieval
        const showThinking = request.showThinking ?? persona.revealReasoningDefault;

        while (state !== QueryState.DONE) {
            signal?.throwIfAborted();
            states.push(state);

            switch (state) {
            case QueryState.START:
                searchPatterns = request.searchPatterns ?? config.enablePatternOverride;
                trace(`[${persona.name}] Processing query`, { domainId: config.id, searchPatterns });
                state = QueryState.PATTERN_CHECK;
                break;

            case QueryState.PATTERN_CHECK:
                hit = searchPatterns ? patterns.lookup(request.query) : null;
                state = hit ? QueryState.PATTERN_HIT : QueryState.FALLBACK;
                break;

            case QueryState.PATTERN_HIT:
                if (hit) {
                    trace(`[${persona.name}] Using pattern override`, { domainId: config.id, patternId: hit.patternId });
                    answer = hit.answer;
                    retrieval = emptyRetrieval('pattern');
                }
                state = QueryState.DONE;
                break;

            case QueryState.FALLBACK:
                trace(`[${persona.name}] Using data source`, { domainId: config.id, dataSource: persona.dataSource });
                state = QueryState.DATA_SOURCE_DISPATCH;
                break;

            case QueryState.DATA_SOURCE_DISPATCH: {
                retrieval = await this.retrieve(snapshot, request);
                signal?.throwIfAborted();
                const response = await this.deps.model.invoke(
                    { query: request.query, context: retrieval.context, showThinking, persona },
                    signal
                );
                answer = response.answer;
                reasoning = showThinking ? response.reasoning : undefined;
                state = QueryState.DONE;
                break;
            }
            }
        }
        states.push(QueryState.DONE);

        const finishedMs = Date.now();
        const result: QueryResult = {
            answer,
            sourceUsed: retrieval.sourceUsed,
            documents: retrieval.documents,
            truncatedDocuments: retrieval.truncatedDocuments,
            domainId: config.id,
            persona: persona.name,
            searchPatterns,
            showThinking,
            states,
            elapsedMs: finishedMs - startedMs,
            startedAt,
            finishedAt: new Date(finishedMs).toISOString(),
        };
        if (reasoning !== undefined) result.reasoning = reasoning;
        if (hit) result.patternId = hit.patternId;
        if (retrieval.degradedFrom) result.degradedFrom = retrieval.degradedFrom;

        trace(`[${persona.name}] Complete`, {
            domainId: config.id,
            source: result.sourceUsed,
            patternId: result.patternId,
            documents: result.documents.length,
            elapsedMs: result.elapsedMs,
        });

        if (hit) this.recordHit(config.id, hit.patternId);
        return result;
    }

    private async retrieve(snapshot: DomainSnapshot, request: QueryRequest): Promise<Retrieval> {
        const { config, persona } = snapshot;

        switch (persona.dataSource) {
        case 'none':
            return emptyRetrieval('none');

        case 'library': {
            let documents: LoadedDocument[];
            try {
                documents = await this.deps.loadDocuments(config.libraryBasePath ?? '', {
                    extensions: config.libraryExtensions,
                    maxDocuments: config.maxLibraryDocuments,
                    maxCharsPerDocument: config.maxCharsPerDocument,
                    signal: request.signal,
                });
            } catch (error) {
                if (error instanceof PathError) {
                    throw new ConfigurationError(
                        'library_base_path',
                        `Domain '${config.id}' is misconfigured: ${error.message}`,
                        { cause: error }
                    );
                }
                throw error;
            }
            return {
                context: formatLibraryContext(documents),
                sourceUsed: 'library',
                documents: documents.map((doc) => doc.id),
                truncatedDocuments: documents.filter((doc) => doc.truncated).map((doc) => doc.id),
            };
        }

        case 'internet':
            try {
                const context = await this.deps.search.search(request.query, request.signal);
                return { ...emptyRetrieval('internet'), context };
            } catch (error) {
                request.signal?.throwIfAborted();
                loggerService.warn('QueryProcessor: Search unavailable, continuing without context', {
                    domainId: config.id,
                    error,
                });
                return { ...emptyRetrieval('none'), degradedFrom: 'internet' };
            }
        }
    }

    private recordHit(domainId: string, patternId: string) {
        const record = this.deps.recordPatternHit;
        if (!record) return;
        record(domainId, patternId).catch((error: unknown) => {
            loggerService.warn('QueryProcessor: Failed to record pattern usage', { domainId, patternId, error });
        });
    }
}
