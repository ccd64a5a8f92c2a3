// src/config/env.ts: load .env once before reading configuration
import dotenv from 'dotenv';
import path from 'path';

let loaded = false;

export function loadEnv(envPath: string = path.resolve(process.cwd(), '.env')): void {
  if (loaded) return;
  dotenv.config({ path: envPath });
  loaded = true;
}

export function getOpenAIApiKey(): string | undefined {
  const key = process.env.OPENAI_API_KEY;
  return key && key.trim() ? key.trim() : undefined;
}

export function getRedisUrl(): string | undefined {
  const url = process.env.REDIS_URL;
  return url && url.trim() ? url.trim() : undefined;
}
