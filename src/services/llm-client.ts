// src/services/llm-client.ts: low-level client implementing LlmClient for the router

import OpenAI from 'openai';
import type { LlmClient, ModelName, LlmCallOptions } from './model-router';

const MODEL_IDS: Record<ModelName, string> = {
  small: 'gpt-4o-mini',
};

const DEFAULT_SYSTEM: Record<LlmCallOptions['task'], string> = {
  relevance: 'You are a strict relevance judge for study material. Respond in JSON only.',
};

export class ProviderLlmClient implements LlmClient {
  private readonly client: OpenAI;

  constructor(apiKey: string, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey });
  }

  async call(model: ModelName, prompt: string, options?: LlmCallOptions): Promise<string> {
    const modelId = MODEL_IDS[model];
    const system = DEFAULT_SYSTEM[options?.task ?? 'relevance'];
    const maxTokens = typeof options?.maxTokens === 'number' ? options.maxTokens : 512;

    const res = await this.client.chat.completions.create(
      {
        model: modelId,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
        temperature: 0,
        max_tokens: maxTokens,
      },
      { signal: options?.signal },
    );
    return res.choices[0]?.message?.content ?? '';
  }
}
