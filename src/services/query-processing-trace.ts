// src/services/query-processing-trace.ts
// Structured tracing for query processing (analyze, decompose, retrieve, fuse, rerank, compress).
import crypto from 'crypto';

export type SpanName = 'analyze' | 'decompose' | 'retrieve' | 'fuse' | 'rerank' | 'compress';

export interface Span {
  name: SpanName;
  startTime: number;
  endTime: number;
  durationMs: number;
  metadata?: Record<string, unknown>;
  error?: string;
}

export interface QueryProcessingTrace {
  traceId: string;
  startTime: number;
  endTime?: number;
  durationMs?: number;
  spans: Span[];
  originalQuery?: string;
}

function generateTraceId(): string {
  return 'qp_' + crypto.randomBytes(8).toString('hex');
}

export function createTrace(options?: { originalQuery?: string }): QueryProcessingTrace {
  return {
    traceId: generateTraceId(),
    startTime: Date.now(),
    spans: [],
    originalQuery: options?.originalQuery,
  };
}

export function addSpan(
  trace: QueryProcessingTrace,
  name: SpanName,
  startTime: number,
  options?: { metadata?: Record<string, unknown>; error?: string },
): void {
  const endTime = Date.now();
  trace.spans.push({
    name,
    startTime,
    endTime,
    durationMs: endTime - startTime,
    metadata: options?.metadata,
    error: options?.error,
  });
}

export function finishTrace(trace: QueryProcessingTrace): void {
  trace.endTime = Date.now();
  trace.durationMs = trace.endTime - trace.startTime;
}
