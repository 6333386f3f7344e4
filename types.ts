// Shared definitions for domains, personas, patterns and query results.

export type DataSource = 'none' | 'library' | 'internet';

export type PersonaName = 'poet' | 'librarian' | 'researcher';

export interface Persona {
  name: PersonaName;
  dataSource: DataSource;
  revealReasoningDefault: boolean;
  /** Emit per-decision logs while this persona handles a query. */
  trace: boolean;
}

export interface DomainConfig {
  id: string;
  name: string;
  description: string;
  persona: PersonaName;
  libraryBasePath?: string;
  enablePatternOverride: boolean;
  libraryExtensions?: string[];
  /** Per-domain library caps; the deployment settings apply when unset. */
  maxLibraryDocuments?: number;
  maxCharsPerDocument?: number;
  createdAt: string;
  updatedAt: string;
}

export type DomainInput = Partial<Omit<DomainConfig, 'id' | 'createdAt' | 'updatedAt'>>;

export type PatternMatcher =
  | { kind: 'substring'; text: string }
  | { kind: 'keywords'; keywords: string[] };

export interface PatternEntry {
  id: string;
  matcher: PatternMatcher;
  answer: string;
  name?: string;
  tags?: string[];
}

export interface PatternWithUsage extends PatternEntry {
  usageCount: number;
}

export interface PatternMatch {
  patternId: string;
  answer: string;
  /** Length of the normalized text that matched; larger is more specific. */
  matchedLength: number;
}

export interface LoadedDocument {
  /** Path relative to the library base, always '/'-separated. */
  id: string;
  path: string;
  name: string;
  content: string;
  truncated: boolean;
}

export enum QueryState {
  START = 'START',
  PATTERN_CHECK = 'PATTERN_CHECK',
  PATTERN_HIT = 'PATTERN_HIT',
  FALLBACK = 'FALLBACK',
  DATA_SOURCE_DISPATCH = 'DATA_SOURCE_DISPATCH',
  DONE = 'DONE',
}

export type SourceUsed = 'pattern' | DataSource;

export interface QueryRequest {
  query: string;
  domainId: string;
  searchPatterns?: boolean;
  showThinking?: boolean;
  signal?: AbortSignal;
}

export interface QueryResult {
  answer: string;
  reasoning?: string;
  sourceUsed: SourceUsed;
  patternId?: string;
  documents: string[];
  truncatedDocuments: string[];
  degradedFrom?: 'internet';
  domainId: string;
  persona: PersonaName;
  searchPatterns: boolean;
  showThinking: boolean;
  states: QueryState[];
  elapsedMs: number;
  startedAt: string;
  finishedAt: string;
}

export interface QueryTrace {
  id: string;
  domainId: string;
  query: string;
  status: 'ok' | 'error';
  states: QueryState[];
  sourceUsed?: SourceUsed;
  patternId?: string;
  documentCount: number;
  elapsedMs: number;
  error?: string;
  timestamp: string;
}
