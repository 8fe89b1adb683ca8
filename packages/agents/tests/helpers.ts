// Shared builders for the agents test suites

import { vi } from 'vitest';
import type { Alert } from '../types/alerts.js';
import type { FindingStatus, SpecialistDomain, SpecialistFinding } from '../types/findings.js';
import type { CompletionOptions, CompletionRequest, ReasoningBackend } from '../bridge/reasoning-backend.js';

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  return {
    name: 'KubePodCrashLooping',
    labels: { namespace: 'ai-platform', pod: 'litellm-7d9f8-abcde' },
    severity: 'warning',
    description: 'Pod is restarting frequently',
    ...overrides,
  };
}

export function makeFinding(
  domain: SpecialistDomain,
  status: FindingStatus = 'OK',
  confidence = 0.5,
  recommendation = '',
): SpecialistFinding {
  return Object.freeze({
    domain,
    status,
    summary: status === 'OK' ? `PASS: ${domain} looks fine` : `${domain} unavailable`,
    confidence: status === 'OK' ? confidence : 0,
    evidence: Object.freeze([]),
    recommendation,
    toolsUsed: Object.freeze([]),
    latencyMs: 5,
  });
}

export type CompleteFn = (request: CompletionRequest, options?: CompletionOptions) => Promise<string>;

/** Backend whose complete() is a vi.fn driven by the given implementation */
export function fakeBackend(impl: CompleteFn, name = 'fake') {
  const complete = vi.fn(impl);
  const backend: ReasoningBackend = { name, model: `${name}-model`, complete };
  return { backend, complete };
}

/** Resolves with each reply in turn, repeating the last one */
export function scriptedBackend(replies: string[], name = 'fake') {
  let call = 0;
  return fakeBackend(async () => replies[Math.min(call++, replies.length - 1)] ?? '', name);
}

/** Never settles until the caller aborts, then rejects with the abort reason */
export function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}
