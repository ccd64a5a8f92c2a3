// src/services/logger.ts: structured logging for the retrieval engine
import { Logger, type ILogObj } from 'tslog';

function resolveMinLevel(): number {
  const raw = process.env.LOG_LEVEL;
  if (raw == null || raw === '') return 3; // info
  const n = parseInt(raw, 10);
  return Number.isFinite(n) && n >= 0 && n <= 6 ? n : 3;
}

export const logger = new Logger<ILogObj>({
  name: 'retrieval-engine',
  minLevel: resolveMinLevel(),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});

/** The slice of the logger the pipeline stages take as a dependency. */
export interface EngineLogger {
  debug(...args: unknown[]): unknown;
  info(...args: unknown[]): unknown;
  warn(...args: unknown[]): unknown;
  error(...args: unknown[]): unknown;
}
