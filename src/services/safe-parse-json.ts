/**
 * Shared JSON parse that strips markdown fences and normalizes quotes.
 * Used by the LLM relevance model; callers validate the shape with zod.
 */
import { logger } from '@/services/logger';

export function stripJsonFences(raw: string): string {
  const txt = raw.trim();
  if (!txt.startsWith('```')) return txt;
  const firstNewline = txt.indexOf('\n');
  const lastFence = txt.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return txt.slice(firstNewline + 1, lastFence).trim();
  }
  return txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns null (logged) when no JSON object can be recovered. */
export function safeParseJson(raw: string, context: string): Record<string, unknown> | null {
  const txt = stripJsonFences(raw);

  for (const attempt of [txt, txt.replace(/'/g, '"')]) {
    try {
      const parsed: unknown = JSON.parse(attempt);
      if (isRecord(parsed)) return parsed;
    } catch {
      // next attempt
    }
  }
  logger.warn('safeParseJson:parse_error', {
    context,
    error: 'Invalid JSON after stripping fences',
    raw: txt.slice(0, 300),
  });
  return null;
}
