// Anthropic Messages API backend
// Used for the primary synthesis tier and for specialist reasoning

import Anthropic from '@anthropic-ai/sdk';
import { ReasoningBackendError } from '../utils/errors.js';
import {
  DEFAULT_MAX_TOKENS, abortedFailure, emptyOutput, httpFailure,
  type CompletionOptions, type CompletionRequest, type ReasoningBackend,
} from './reasoning-backend.js';

export interface AnthropicBackendConfig {
  apiKey: string;
  model: string;
  /** Override for proxies and tests */
  baseURL?: string;
}

export class AnthropicBackend implements ReasoningBackend {
  readonly name = 'anthropic';
  readonly model: string;
  private readonly client: Anthropic;

  constructor(config: AnthropicBackendConfig) {
    this.model = config.model;
    // Retries belong to the fallback controller, not the SDK
    this.client = new Anthropic({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
  }

  async complete(request: CompletionRequest, options: CompletionOptions = {}): Promise<string> {
    let text: string;
    try {
      const message = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          temperature: request.temperature ?? 0.2,
          system: request.system,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal: options.signal },
      );
      text = message.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
    } catch (err) {
      throw this.toBackendError(err, options.signal);
    }

    if (!text) throw emptyOutput(this.name);
    return text;
  }

  private toBackendError(err: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted) return abortedFailure(this.name, signal, err);
    if (err instanceof Anthropic.APIConnectionTimeoutError) {
      return new ReasoningBackendError(this.name, 'timeout', `${this.name} request timed out`, { cause: err });
    }
    if (err instanceof Anthropic.APIConnectionError) {
      return new ReasoningBackendError(this.name, 'connection', `${this.name} connection failed: ${err.message}`, { cause: err });
    }
    if (err instanceof Anthropic.APIError && typeof err.status === 'number') {
      return httpFailure(this.name, err.status, err.message, err);
    }
    return err;
  }
}

/** Returns null when no API key is configured */
export function createAnthropicBackend(config: { apiKey?: string; model: string }): AnthropicBackend | null {
  if (!config.apiKey) return null;
  return new AnthropicBackend({ apiKey: config.apiKey, model: config.model });
}
