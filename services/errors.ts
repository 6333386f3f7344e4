/**
 * Raised when a domain or persona is configured in a way that cannot serve queries.
 * `field` names the offending configuration key as it appears on the wire.
 */
export class ConfigurationError extends Error {
    readonly field: string;

    constructor(field: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
        this.field = field;
    }
}

export class PathError extends Error {
    readonly path: string;

    constructor(path: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PathError';
        this.path = path;
    }
}

export class LoadTimeout extends Error {
    readonly path: string;
    readonly timeoutMs: number;

    constructor(path: string, timeoutMs: number) {
        super(`Library load under '${path}' exceeded ${timeoutMs}ms`);
        this.name = 'LoadTimeout';
        this.path = path;
        this.timeoutMs = timeoutMs;
    }
}

export class SearchUnavailable extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SearchUnavailable';
    }
}

export class DomainNotFoundError extends Error {
    readonly domainId: string;

    constructor(domainId: string) {
        super(`Domain '${domainId}' not found`);
        this.name = 'DomainNotFoundError';
        this.domainId = domainId;
    }
}

export class DomainExistsError extends Error {
    readonly domainId: string;

    constructor(domainId: string) {
        super(`Domain '${domainId}' already exists.`);
        this.name = 'DomainExistsError';
        this.domainId = domainId;
    }
}
