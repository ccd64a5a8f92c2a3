// src/services/model-router.ts: central routing per task type

export type ModelName = 'small';

export interface LlmCallOptions {
  task: 'relevance';
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LlmClient {
  call(model: ModelName, prompt: string, options?: LlmCallOptions): Promise<string>;
}

export class SimpleModelRouter {
  private client: LlmClient;

  constructor(client: LlmClient) {
    this.client = client;
  }

  /** Pointwise relevance judgements run on the small model. */
  async judgeRelevance(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.client.call('small', prompt, {
      task: 'relevance',
      maxTokens: 32,
      signal,
    });
  }
}
