import OpenAI from 'openai';

import { ConfigurationError } from '../errors';

export type CompletionOptions = {
  temperature: number;
  maxTokens: number;
};

export interface CompletionModel {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

type OpenAiCompletionModelOptions = {
  baseUrl: string;
  model: string;
  apiKey?: string;
};

/**
 * Chat-completions client for any OpenAI-compatible endpoint (OpenRouter by default).
 * The SDK client is created on first use so the service can boot without a key.
 */
export class OpenAiCompletionModel implements CompletionModel {
  private client: OpenAI | null = null;

  private readonly baseUrl: string;

  private readonly model: string;

  private readonly apiKey: string | undefined;

  constructor({ baseUrl, model, apiKey }: OpenAiCompletionModelOptions) {
    this.baseUrl = baseUrl;
    this.model = model;
    this.apiKey = apiKey;
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    if (!this.apiKey) {
      throw new ConfigurationError('LLM API key not configured. Set LLM_API_KEY.');
    }

    this.client = new OpenAI({
      apiKey: this.apiKey,
      baseURL: this.baseUrl,
      // Retries are the caller's decision; a generation request makes exactly one call.
      maxRetries: 0,
    });

    return this.client;
  }

  async complete(prompt: string, { temperature, maxTokens }: CompletionOptions): Promise<string> {
    const response = await this.getClient().chat.completions.create({
      model: this.model,
      temperature,
      max_tokens: maxTokens,
      messages: [{ role: 'user', content: prompt }],
    });

    const content = response.choices[0]?.message?.content;

    if (!content) {
      throw new Error('LLM response did not contain any content.');
    }

    return content;
  }
}
