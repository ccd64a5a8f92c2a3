// src/services/cache.ts: Redis cache-aside for per-route retrieval lists; optional when Redis is unavailable
import Redis from 'ioredis';
import { logger, type EngineLogger } from './logger';

/** Cache used by the router. Implementations must not throw; a miss is `null`. Values come back unvalidated. */
export interface RetrievalCache {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
}

function redisError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class RedisRetrievalCache implements RetrievalCache {
  constructor(
    private readonly client: Redis,
    private readonly log: EngineLogger = logger,
  ) {}

  async get(key: string): Promise<unknown> {
    if (this.client.status !== 'ready') return null;
    try {
      const raw = await this.client.get(key);
      if (!raw) return null;
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (err) {
      this.log.warn('redis:get_error', { key, error: redisError(err) });
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    if (this.client.status !== 'ready') return;
    try {
      await this.client.set(key, JSON.stringify(value), 'EX', ttlSeconds);
    } catch (err) {
      this.log.warn('redis:set_error', { key, error: redisError(err) });
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Connects to REDIS_URL. Returns null (logged) when the URL is unset or the server does not answer,
 * so retrieval runs uncached.
 */
export async function connectRetrievalCache(
  redisUrl: string | undefined,
  log: EngineLogger = logger,
): Promise<RedisRetrievalCache | null> {
  if (!redisUrl || !redisUrl.trim()) {
    log.info('redis:skipped', { reason: 'REDIS_URL not set' });
    return null;
  }

  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    retryStrategy(times) {
      if (times > 3) return null; // stop after 3 retries
      return Math.min(times * 200, 2000);
    },
  });

  client.on('error', (err: Error) => {
    log.warn('redis:error', { error: redisError(err) });
  });

  try {
    await client.connect();
    await client.ping();
    log.info('redis:connected');
    return new RedisRetrievalCache(client, log);
  } catch (err) {
    log.warn('redis:connect_failed', { error: redisError(err) });
    client.disconnect();
    return null;
  }
}
