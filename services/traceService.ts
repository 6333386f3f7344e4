import type { QueryTrace } from '../types.js';

const MAX_TRACES = 200;

class TraceService {
  private traces: QueryTrace[] = [];

  addTrace(trace: Omit<QueryTrace, 'id' | 'timestamp'> & Partial<Pick<QueryTrace, 'id' | 'timestamp'>>): QueryTrace {
    const entry: QueryTrace = {
      ...trace,
      id: trace.id ?? `TR-${Date.now()}-${Math.floor(Math.random() * 1000)}`,
      timestamp: trace.timestamp ?? new Date().toISOString(),
    };
    this.traces.push(entry);
    if (this.traces.length > MAX_TRACES) {
      this.traces = this.traces.slice(-MAX_TRACES);
    }
    return entry;
  }

  /** Most recent first. */
  getTraces(limit = MAX_TRACES, domainId?: string): QueryTrace[] {
    return this.traces
      .filter((trace) => !domainId || trace.domainId === domainId)
      .slice(-limit)
      .reverse();
  }

  clear() {
    this.traces = [];
  }
}

export const traceService = new TraceService();
