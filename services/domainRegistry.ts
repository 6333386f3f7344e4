import type { DomainConfig, PatternEntry, Persona } from '../types.js';
import { ConfigurationError, DomainNotFoundError } from './errors.js';
import { loggerService } from './loggerService.js';
import { PatternStore } from './patternStore.js';
import { personaService } from './personaService.js';

export interface DomainConfigStore {
    getDomain(domainId: string): Promise<DomainConfig | null>;
    listPatterns(domainId: string): Promise<PatternEntry[]>;
}

/** Read-only view of one domain, shared by every query that targets it. */
export interface DomainSnapshot {
    config: Readonly<DomainConfig>;
    persona: Readonly<Persona>;
    patterns: PatternStore;
}

const buildSnapshot = (config: DomainConfig, patterns: PatternEntry[]): DomainSnapshot => {
    const persona = personaService.getPersona(config.persona);
    if (persona.dataSource === 'library' && !config.libraryBasePath?.trim()) {
        throw new ConfigurationError(
            'library_base_path',
            `Domain '${config.id}' uses persona '${persona.name}' which requires library_base_path`
        );
    }
    return {
        config: Object.freeze({ ...config, libraryExtensions: config.libraryExtensions?.slice() }),
        persona,
        patterns: new PatternStore(patterns),
    };
};

/**
 * The set of loaded domains. Snapshots are built once per domain and reused until
 * invalidated; callers receive the same immutable object concurrently.
 */
export class DomainRegistry {
    private readonly snapshots = new Map<string, Promise<DomainSnapshot>>();

    constructor(private readonly store: DomainConfigStore) {}

    get(domainId: string): Promise<DomainSnapshot> {
        const cached = this.snapshots.get(domainId);
        if (cached) return cached;

        const pending = this.load(domainId);
        this.snapshots.set(domainId, pending);
        // A failed load is not cached, so a fixed configuration is picked up on the next query
        pending.catch(() => {
            if (this.snapshots.get(domainId) === pending) this.snapshots.delete(domainId);
        });
        return pending;
    }

    invalidate(domainId: string): void {
        this.snapshots.delete(domainId);
    }

    clear(): void {
        this.snapshots.clear();
    }

    loadedDomains(): string[] {
        return Array.from(this.snapshots.keys()).sort();
    }

    private async load(domainId: string): Promise<DomainSnapshot> {
        const [config, patterns] = await Promise.all([
            this.store.getDomain(domainId),
            this.store.listPatterns(domainId),
        ]);
        if (!config) {
            throw new DomainNotFoundError(domainId);
        }
        const snapshot = buildSnapshot(config, patterns);
        loggerService.debug('DomainRegistry: Loaded domain', {
            domainId,
            persona: snapshot.persona.name,
            patterns: snapshot.patterns.size,
        });
        return snapshot;
    }
}
