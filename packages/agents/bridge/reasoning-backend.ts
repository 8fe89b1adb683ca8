// Reasoning backend contract shared by specialists and synthesis tiers
// A backend turns one system + user prompt into raw text; callers own parsing

import { ReasoningBackendError } from '../utils/errors.js';

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionOptions {
  signal?: AbortSignal;
}

export interface ReasoningBackend {
  readonly name: string;
  readonly model: string;
  complete(request: CompletionRequest, options?: CompletionOptions): Promise<string>;
}

export const DEFAULT_MAX_TOKENS = 1024;

/** Map an HTTP status from a model API into the backend error shape */
export function httpFailure(backend: string, status: number, message: string, cause?: unknown): ReasoningBackendError {
  return new ReasoningBackendError(
    backend,
    status === 429 ? 'rate-limited' : 'http',
    `${backend} returned HTTP ${status}: ${message}`,
    { status, cause },
  );
}

/** Our own deadline fired: the SDK reports it as a user abort */
export function abortedFailure(backend: string, signal: AbortSignal, cause: unknown): ReasoningBackendError {
  const reason = signal.reason instanceof Error ? signal.reason.message : 'request aborted';
  return new ReasoningBackendError(backend, 'timeout', `${backend} call aborted: ${reason}`, { cause });
}

export function emptyOutput(backend: string): ReasoningBackendError {
  return new ReasoningBackendError(backend, 'empty', `${backend} returned an empty completion`);
}
