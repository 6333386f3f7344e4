import { describe, it, expect, beforeEach } from 'vitest';
import { traceService } from '../services/traceService.js';
import { QueryState } from '../types.js';

const addTrace = (domainId: string, query: string) =>
    traceService.addTrace({
        domainId,
        query,
        status: 'ok',
        states: [QueryState.START, QueryState.DONE],
        documentCount: 0,
        elapsedMs: 1,
    });

describe('TraceService', () => {
    beforeEach(() => {
        traceService.clear();
    });

    it('assigns an id and timestamp', () => {
        const trace = addTrace('geo', 'q');
        expect(trace.id).toMatch(/^TR-\d+-\d+$/);
        expect(Number.isNaN(Date.parse(trace.timestamp))).toBe(false);
    });

    it('returns the most recent traces first', () => {
        addTrace('geo', 'first');
        addTrace('geo', 'second');
        addTrace('geo', 'third');

        expect(traceService.getTraces(2).map((t) => t.query)).toEqual(['third', 'second']);
    });

    it('filters by domain', () => {
        addTrace('geo', 'a');
        addTrace('docs', 'b');

        expect(traceService.getTraces(10, 'docs').map((t) => t.query)).toEqual(['b']);
    });

    it('keeps at most 200 traces', () => {
        for (let i = 0; i < 205; i++) addTrace('geo', `q${i}`);

        const traces = traceService.getTraces(1000);
        expect(traces).toHaveLength(200);
        expect(traces[199].query).toBe('q5');
    });
});
