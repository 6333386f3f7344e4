import express, { type Request, type Response } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { domainService, parseDomainInput } from './services/domainService.js';
import { domainImportService } from './services/domainImportService.js';
import { DomainRegistry } from './services/domainRegistry.js';
import {
    ConfigurationError,
    DomainExistsError,
    DomainNotFoundError,
    LoadTimeout,
    PathError,
} from './services/errors.js';
import { inferenceService } from './services/inferenceService.js';
import { libraryService } from './services/libraryService.js';
import { loggerService } from './services/loggerService.js';
import { isRecord, parsePatternEntry } from './services/patternStore.js';
import { personaService } from './services/personaService.js';
import { QueryProcessor } from './services/queryProcessor.js';
import { searchService } from './services/searchService.js';
import { settingsService } from './services/settingsService.js';
import { traceService } from './services/traceService.js';

dotenv.config();

export const registry = new DomainRegistry(domainService);

export const queryProcessor = new QueryProcessor({
    registry,
    loadDocuments: libraryService.loadDocuments,
    search: searchService,
    model: inferenceService,
    recordPatternHit: domainService.recordPatternHit,
});

const app = express();
app.use(cors());
app.use(express.json({ limit: '1mb' }));

// Request Logging Middleware
app.use((req, res, next) => {
    loggerService.info(`Request: ${req.method} ${req.url}`);
    next();
});

const sendError = (req: Request, res: Response, error: unknown) => {
    if (error instanceof DomainNotFoundError) {
        res.status(404).json({ error: error.message });
    } else if (error instanceof DomainExistsError) {
        res.status(409).json({ error: error.message });
    } else if (error instanceof ConfigurationError) {
        res.status(422).json({ error: error.message, field: error.field });
    } else if (error instanceof PathError) {
        res.status(422).json({ error: error.message });
    } else if (error instanceof LoadTimeout) {
        res.status(504).json({ error: error.message });
    } else {
        loggerService.error(`Error in ${req.method} ${req.url}`, { error });
        res.status(500).json({ error: String(error) });
    }
};

const readOptionalFlag = (body: Record<string, unknown>, key: string): boolean | undefined | null => {
    const value = body[key];
    if (value === undefined || value === null) return undefined;
    return typeof value === 'boolean' ? value : null;
};

// Health Check Endpoint
app.get('/api/health', async (req, res) => {
    const redis = await domainService.healthCheck();
    res.json({
        status: redis ? 'healthy' : 'degraded',
        services: {
            redis: redis ? 'up' : 'down',
        },
        loadedDomains: registry.loadedDomains(),
        timestamp: new Date().toISOString(),
    });
});

app.get('/api/personas', (req, res) => {
    res.json(personaService.listPersonas());
});

// --- Domain Management ---

app.get('/api/domains', async (req, res) => {
    try {
        res.json(await domainService.getAllDomains());
    } catch (e) {
        sendError(req, res, e);
    }
});

app.post('/api/domains', async (req, res) => {
    const body: unknown = req.body;
    const domainId = isRecord(body) ? body.domain_id ?? body.id : undefined;
    if (typeof domainId !== 'string' || !domainId.trim()) {
        res.status(400).json({ error: 'domain_id is required' });
        return;
    }

    try {
        const created = await domainService.createDomain(domainId.trim(), parseDomainInput(body));
        res.status(201).json(created);
    } catch (e) {
        sendError(req, res, e);
    }
});

app.get('/api/domains/:id', async (req, res) => {
    try {
        const domain = await domainService.getDomain(req.params.id);
        if (!domain) {
            res.status(404).json({ error: `Domain '${req.params.id}' not found` });
            return;
        }
        res.json(domain);
    } catch (e) {
        sendError(req, res, e);
    }
});

app.patch('/api/domains/:id', async (req, res) => {
    try {
        const updated = await domainService.updateDomain(req.params.id, parseDomainInput(req.body));
        registry.invalidate(req.params.id);
        res.json(updated);
    } catch (e) {
        sendError(req, res, e);
    }
});

app.delete('/api/domains/:id', async (req, res) => {
    try {
        const removed = await domainService.deleteDomain(req.params.id);
        registry.invalidate(req.params.id);
        res.json({ status: removed ? 'deleted' : 'not_found' });
    } catch (e) {
        sendError(req, res, e);
    }
});

// --- Patterns ---

app.get('/api/domains/:id/patterns', async (req, res) => {
    try {
        if (!(await domainService.hasDomain(req.params.id))) {
            res.status(404).json({ error: `Domain '${req.params.id}' not found` });
            return;
        }
        const patterns = await domainService.listPatternsWithUsage(req.params.id);
        res.json({ domain: req.params.id, count: patterns.length, patterns });
    } catch (e) {
        sendError(req, res, e);
    }
});

app.put('/api/domains/:id/patterns/:patternId', async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
        res.status(400).json({ error: 'Pattern body must be a JSON object' });
        return;
    }

    try {
        const pattern = parsePatternEntry({ ...body, id: req.params.patternId });
        await domainService.upsertPattern(req.params.id, pattern);
        registry.invalidate(req.params.id);
        res.json(pattern);
    } catch (e) {
        sendError(req, res, e);
    }
});

app.delete('/api/domains/:id/patterns/:patternId', async (req, res) => {
    try {
        const removed = await domainService.deletePattern(req.params.id, req.params.patternId);
        registry.invalidate(req.params.id);
        res.json({ status: removed ? 'deleted' : 'not_found' });
    } catch (e) {
        sendError(req, res, e);
    }
});

// --- Query ---

app.post('/api/query', async (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.query !== 'string' || !body.query.trim()) {
        res.status(400).json({ error: 'query is required' });
        return;
    }
    if (typeof body.domain !== 'string' || !body.domain.trim()) {
        res.status(400).json({ error: 'domain is required' });
        return;
    }

    const searchPatterns = readOptionalFlag(body, 'search_patterns');
    const showThinking = readOptionalFlag(body, 'show_thinking');
    if (searchPatterns === null || showThinking === null) {
        res.status(400).json({ error: 'search_patterns and show_thinking must be booleans when present' });
        return;
    }

    const query = body.query;
    const domainId = body.domain.trim();

    // Abandon in-flight library reads when the client goes away
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableEnded) controller.abort(new Error('Client disconnected'));
    });

    const started = Date.now();
    try {
        const result = await queryProcessor.process({
            query,
            domainId,
            searchPatterns,
            showThinking,
            signal: controller.signal,
        });
        traceService.addTrace({
            domainId,
            query,
            status: 'ok',
            states: result.states,
            sourceUsed: result.sourceUsed,
            patternId: result.patternId,
            documentCount: result.documents.length,
            elapsedMs: result.elapsedMs,
        });
        res.json(result);
    } catch (e) {
        traceService.addTrace({
            domainId,
            query,
            status: 'error',
            states: [],
            documentCount: 0,
            elapsedMs: Date.now() - started,
            error: e instanceof Error ? e.message : String(e),
        });
        if (controller.signal.aborted) {
            loggerService.info('Query abandoned by client', { domainId });
            return;
        }
        sendError(req, res, e);
    }
});

// Trace Endpoint
app.get('/api/traces', (req, res) => {
    const limit = typeof req.query.limit === 'string' ? Number.parseInt(req.query.limit, 10) : undefined;
    const domain = typeof req.query.domain === 'string' ? req.query.domain : undefined;
    res.json(traceService.getTraces(limit !== undefined && Number.isFinite(limit) && limit > 0 ? limit : 20, domain));
});

export { app };

if (process.argv[1] === fileURLToPath(import.meta.url)) {
    const PORT = settingsService.getPort();
    app.listen(PORT, async () => {
        loggerService.info(`Wayfinder Node running on port ${PORT}`);

        const redisHealth = await domainService.healthCheck();
        if (redisHealth) loggerService.info('Redis Connection: OK');
        else loggerService.error('Redis Connection: FAILED');

        const domainsPath = settingsService.getDomainsPath();
        if (domainsPath) {
            try {
                const result = await domainImportService.importDirectory(domainsPath);
                for (const { domainId } of result.imported) registry.invalidate(domainId);
                loggerService.info('Startup domain import finished', {
                    imported: result.imported.length,
                    failed: result.failed.length,
                });
            } catch (error) {
                loggerService.error('Startup domain import failed', { domainsPath, error });
            }
        }
    });
}
