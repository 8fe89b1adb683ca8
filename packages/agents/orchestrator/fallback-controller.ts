// Fallback controller: the synthesis tier state machine
//
//   primary --fail--> secondary --fail--> rule-based --fail--> (fatal)
//      |                  |                    |
//      +-- success -------+---- success -------+--> done
//
// A transient failure on a tier's first attempt retries that tier once after a fixed backoff.
// An exhausted model tier skips straight to rule-based.

import type { FailureKind, SynthesisTier } from '../types/synthesis.js';
import { MalformedOutputError, ReasoningBackendError } from '../utils/errors.js';

export type FallbackState = SynthesisTier | 'done';

export const MAX_ATTEMPTS_PER_TIER = 2;
export const DEFAULT_RETRY_BACKOFF_MS = 250;

const SUCCESSOR: Record<SynthesisTier, FallbackState> = {
  primary: 'secondary',
  secondary: 'rule-based',
  // No successor: a rule-based failure ends the run without a result
  'rule-based': 'done',
};

const UNAVAILABLE_STATUSES = new Set([401, 403, 404, 503]);

export interface Transition {
  state: FallbackState;
  /** Attempt number to use in the next state (1 when moving to a new tier) */
  attempt: number;
  /** Wait this long before the next attempt */
  delayMs: number;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function classifyStatus(status: number): FailureKind {
  if (status === 429) return 'rate-limited';
  if (UNAVAILABLE_STATUSES.has(status)) return 'unavailable';
  if (status >= 500 || status === 408) return 'transient';
  return 'unavailable';
}

export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof MalformedOutputError) return 'transient';

  if (err instanceof ReasoningBackendError) {
    switch (err.reason) {
      case 'rate-limited':
        return 'rate-limited';
      case 'timeout':
      case 'empty':
        return 'transient';
      case 'not-configured':
      case 'connection':
        return 'unavailable';
      case 'http':
        return err.status === undefined ? 'unavailable' : classifyStatus(err.status);
    }
  }

  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) return 'transient';

  const status = statusOf(err);
  if (status !== undefined) return classifyStatus(status);

  return 'unavailable';
}

export class FallbackController {
  readonly retryBackoffMs: number;

  constructor(retryBackoffMs = DEFAULT_RETRY_BACKOFF_MS) {
    this.retryBackoffMs = retryBackoffMs;
  }

  /** The first tier to try */
  initial(): Transition {
    return { state: 'primary', attempt: 1, delayMs: 0 };
  }

  next(tier: SynthesisTier, attempt: number, outcome: 'success' | FailureKind): Transition {
    if (outcome === 'success') return { state: 'done', attempt, delayMs: 0 };

    if (outcome === 'exhausted' && tier !== 'rule-based') {
      return { state: 'rule-based', attempt: 1, delayMs: 0 };
    }

    if (outcome === 'transient' && attempt < MAX_ATTEMPTS_PER_TIER && tier !== 'rule-based') {
      return { state: tier, attempt: attempt + 1, delayMs: this.retryBackoffMs };
    }

    return { state: SUCCESSOR[tier], attempt: 1, delayMs: 0 };
  }
}
