// src/services/errors.ts: error taxonomy for the retrieval engine.
// Only InvalidQueryError and ConfigurationError escape retrieveAndCompress; the rest are
// recovered locally and surface as quality metadata.
import type { Route, ScoreName } from '@/types/core';

export class RetrievalEngineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = 'RetrievalEngineError';
  }
}

export class InvalidQueryError extends RetrievalEngineError {
  constructor(message: string) {
    super(message, 'INVALID_QUERY', false);
    this.name = 'InvalidQueryError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends RetrievalEngineError {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = [],
  ) {
    super(message, 'INVALID_CONFIGURATION', false);
    this.name = 'ConfigurationError';
  }
}

export class AdapterTimeoutError extends RetrievalEngineError {
  constructor(
    public readonly route: Route,
    public readonly timeoutMs: number,
  ) {
    super(`${route} adapter exceeded ${timeoutMs}ms`, 'ADAPTER_TIMEOUT', true);
    this.name = 'AdapterTimeoutError';
  }
}

/** A route's adapter failed for a reason other than its timeout. */
export class AdapterError extends RetrievalEngineError {
  constructor(
    public readonly route: Route,
    message: string,
  ) {
    super(message, 'ADAPTER_ERROR', true);
    this.name = 'AdapterError';
  }
}

/** Thrown by a scoring function that cannot score this candidate (model down, missing input). */
export class ScoringUnavailableError extends RetrievalEngineError {
  constructor(
    public readonly scorer: ScoreName,
    message: string,
  ) {
    super(message, 'SCORING_UNAVAILABLE', true);
    this.name = 'ScoringUnavailableError';
  }
}

export class DeadlineExceededError extends RetrievalEngineError {
  constructor(
    message: string,
    public readonly cancelled: boolean,
  ) {
    super(message, cancelled ? 'CANCELLED' : 'DEADLINE_EXCEEDED', !cancelled);
    this.name = 'DeadlineExceededError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
