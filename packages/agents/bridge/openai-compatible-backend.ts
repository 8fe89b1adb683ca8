// OpenAI-compatible chat completions backend
// Secondary synthesis tier: a smaller local model behind a LiteLLM-style proxy

import OpenAI from 'openai';
import { ReasoningBackendError } from '../utils/errors.js';
import {
  DEFAULT_MAX_TOKENS, abortedFailure, emptyOutput, httpFailure,
  type CompletionOptions, type CompletionRequest, type ReasoningBackend,
} from './reasoning-backend.js';

export interface OpenAiCompatibleConfig {
  baseURL: string;
  model: string;
  apiKey?: string;
}

export class OpenAiCompatibleBackend implements ReasoningBackend {
  readonly name = 'openai-compatible';
  readonly model: string;
  private readonly client: OpenAI;

  constructor(config: OpenAiCompatibleConfig) {
    this.model = config.model;
    this.client = new OpenAI({
      baseURL: config.baseURL,
      // Local proxies often run without auth; the SDK still requires a value
      apiKey: config.apiKey ?? 'unused',
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest, options: CompletionOptions = {}): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          response_format: { type: 'json_object' },
          temperature: request.temperature ?? 0.2,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
        },
        { signal: options.signal },
      );
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw this.toBackendError(err, options.signal);
    }

    const text = content?.trim();
    if (!text) throw emptyOutput(this.name);
    return text;
  }

  private toBackendError(err: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted) return abortedFailure(this.name, signal, err);
    if (err instanceof OpenAI.APIConnectionTimeoutError) {
      return new ReasoningBackendError(this.name, 'timeout', `${this.name} request timed out`, { cause: err });
    }
    if (err instanceof OpenAI.APIConnectionError) {
      return new ReasoningBackendError(this.name, 'connection', `${this.name} connection failed: ${err.message}`, { cause: err });
    }
    if (err instanceof OpenAI.APIError && typeof err.status === 'number') {
      return httpFailure(this.name, err.status, err.message, err);
    }
    return err;
  }
}

/** Returns null when no endpoint is configured */
export function createOpenAiCompatibleBackend(config: {
  baseUrl?: string;
  apiKey?: string;
  model: string;
}): OpenAiCompatibleBackend | null {
  if (!config.baseUrl) return null;
  return new OpenAiCompatibleBackend({ baseURL: config.baseUrl, apiKey: config.apiKey, model: config.model });
}
