// Synthesizer: turns the finding set into one verdict
// Tiers run strictly in sequence under the fallback controller: primary model,
// secondary model, then rule-based scoring. Only a rule-based failure escapes.
// Model tiers share one budget; once it is spent, or the caller cancels, rule-based answers.

import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Alert } from '../types/alerts.js';
import type { SpecialistFinding } from '../types/findings.js';
import type {
  DomainWeights, SynthesisResult, SynthesisTier, TierAttempt, TierVerdict,
} from '../types/synthesis.js';
import type { EventBus } from '../types/events.js';
import type { ReasoningBackend } from '../bridge/reasoning-backend.js';
import { SynthesisOutputSchema } from '../schemas/investigation.js';
import { ReasoningBackendError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { excerpt, parseModelOutput } from '../utils/model-output.js';
import { FallbackController, classifyFailure } from './fallback-controller.js';
import { DEFAULT_THRESHOLDS, ruleBasedSynthesis, type RuleBasedThresholds } from './rule-based-synthesis.js';

const log = createLogger('Synthesizer');

export const DEFAULT_SYNTHESIS_TIMEOUT_MS = 20_000;
export const DEFAULT_SYNTHESIS_BUDGET_MS = 30_000;

/** The secondary model is smaller; its confidence never exceeds this */
export const SECONDARY_CONFIDENCE_CAP = 0.7;

export interface SynthesizerConfig {
  primary: ReasoningBackend | null;
  secondary: ReasoningBackend | null;
  thresholds?: RuleBasedThresholds;
  /** Per model call */
  timeoutMs?: number;
  /** All model calls and backoffs together */
  budgetMs?: number;
  retryBackoffMs?: number;
  eventBus?: EventBus;
}

export interface SynthesizeOptions {
  requestId?: string;
  signal?: AbortSignal;
}

const SYNTHESIS_PROMPT = `You are synthesizing findings from several specialist agents that investigated the same alert.

Each finding carries an authority weight for this kind of alert: trust higher-weighted domains more.
Findings with status ERROR or TIMEOUT carry no evidence; say so if they leave a gap.

Determine the overall verdict:
- ACTIONABLE: a real problem that needs a fix
- BENIGN: no action needed (false positive, transient, already recovered)
- INCONCLUSIVE: the evidence does not support either

Respond with a single JSON object and nothing else:
{"verdict": "ACTIONABLE" | "BENIGN" | "INCONCLUSIVE", "confidence": <0.0-1.0>, "synthesis": "<brief root-cause explanation>", "suggested_action": "<specific command or action if actionable, else empty>"}`;

export function buildSynthesisPrompt(
  alert: Alert,
  findings: readonly SpecialistFinding[],
  weights: DomainWeights,
): string {
  const findingsText = findings.map((f) => [
    `**${f.domain.toUpperCase()}** (weight: ${weights[f.domain]})`,
    `Status: ${f.status}`,
    `Summary: ${f.summary}`,
    `Confidence: ${f.confidence}`,
    `Evidence: ${f.evidence.length > 0 ? excerpt(f.evidence.join('\n'), 200) : 'None'}`,
    `Recommendation: ${f.recommendation || 'None'}`,
  ].join('\n')).join('\n\n');

  return [
    `Alert: ${alert.name} (${alert.severity})`,
    `Labels: ${JSON.stringify(alert.labels)}`,
    `Description: ${alert.description || 'N/A'}`,
    '',
    'Specialist findings:',
    findingsText,
    '',
    'Synthesize these findings into a final verdict and action.',
  ].join('\n');
}

export class Synthesizer {
  private readonly config: SynthesizerConfig;
  private readonly controller: FallbackController;
  private readonly thresholds: RuleBasedThresholds;
  private readonly timeoutMs: number;
  private readonly budgetMs: number;

  constructor(config: SynthesizerConfig) {
    this.config = config;
    this.controller = new FallbackController(config.retryBackoffMs);
    this.thresholds = config.thresholds ?? DEFAULT_THRESHOLDS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_SYNTHESIS_TIMEOUT_MS;
    this.budgetMs = config.budgetMs ?? DEFAULT_SYNTHESIS_BUDGET_MS;
  }

  async synthesize(
    alert: Alert,
    findings: readonly SpecialistFinding[],
    weights: DomainWeights,
    options: SynthesizeOptions = {},
  ): Promise<SynthesisResult> {
    const requestId = options.requestId;
    const attempts: TierAttempt[] = [];
    const budgetEndsAt = Date.now() + this.budgetMs;
    let { state, attempt } = this.controller.initial();

    while (state !== 'done') {
      const tier: SynthesisTier = state;
      const start = Date.now();

      if (tier !== 'rule-based') {
        const stop = this.stopReason(budgetEndsAt, options.signal);
        if (stop) {
          attempts.push({ tier, attempt, outcome: 'exhausted', error: stop, durationMs: 0 });
          this.emit('SynthesisTierFailed', requestId, { tier, attempt, kind: 'exhausted', error: stop });
          log('warn', `Synthesis tier ${tier} skipped`, { requestId, attempt, reason: stop });
          ({ state, attempt } = this.controller.next(tier, attempt, 'exhausted'));
          continue;
        }
      }

      this.emit('SynthesisAttempted', requestId, { tier, attempt });

      let verdict: TierVerdict;
      try {
        verdict = tier === 'rule-based'
          ? ruleBasedSynthesis(findings, weights, this.thresholds)
          : await this.runModelTier(tier, alert, findings, weights, {
            timeoutMs: Math.min(this.timeoutMs, budgetEndsAt - start),
            signal: options.signal,
          });
      } catch (err) {
        const durationMs = Date.now() - start;
        if (tier === 'rule-based') {
          attempts.push({ tier, attempt, outcome: 'fatal', error: errorMessage(err), durationMs });
          this.emit('SynthesisTierFailed', requestId, { tier, attempt, kind: 'fatal', error: errorMessage(err) });
          log('error', 'Rule-based synthesis failed', { requestId, error: errorMessage(err) });
          throw err;
        }

        const kind = this.stopReason(budgetEndsAt, options.signal) ? 'exhausted' : classifyFailure(err);
        attempts.push({ tier, attempt, outcome: kind, error: errorMessage(err), durationMs });
        this.emit('SynthesisTierFailed', requestId, { tier, attempt, kind, error: errorMessage(err) });
        log('warn', `Synthesis tier ${tier} failed`, { requestId, attempt, kind, error: errorMessage(err) });

        const transition = this.controller.next(tier, attempt, kind);
        const delayMs = Math.min(transition.delayMs, budgetEndsAt - Date.now());
        if (delayMs > 0) await sleep(delayMs);
        ({ state, attempt } = transition);
        continue;
      }

      attempts.push({ tier, attempt, outcome: 'success', durationMs: Date.now() - start });
      const result: SynthesisResult = Object.freeze({
        ...verdict,
        fallbackUsed: tier !== 'primary',
        strategy: tier,
        attempts: Object.freeze(attempts),
      });
      this.emit('SynthesisCompleted', requestId, {
        strategy: tier,
        verdict: result.verdict,
        confidence: result.confidence,
        fallbackUsed: result.fallbackUsed,
      });
      return result;
    }

    // Unreachable: rule-based either returns or throws
    throw new Error('synthesis ended without a result');
  }

  /** Why no further model call may start, if any */
  private stopReason(budgetEndsAt: number, signal?: AbortSignal): string | undefined {
    if (signal?.aborted) return 'investigation cancelled';
    if (Date.now() >= budgetEndsAt) return `synthesis budget of ${this.budgetMs}ms spent`;
    return undefined;
  }

  private async runModelTier(
    tier: Exclude<SynthesisTier, 'rule-based'>,
    alert: Alert,
    findings: readonly SpecialistFinding[],
    weights: DomainWeights,
    { timeoutMs, signal }: { timeoutMs: number; signal?: AbortSignal },
  ): Promise<TierVerdict> {
    const backend = this.config[tier];
    if (!backend) {
      throw new ReasoningBackendError(tier, 'not-configured', `${tier} synthesis backend is not configured`);
    }

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`synthesis call exceeded ${timeoutMs}ms`)),
      timeoutMs,
    );
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) onAbort();
    else signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const raw = await backend.complete(
        {
          system: SYNTHESIS_PROMPT,
          prompt: buildSynthesisPrompt(alert, findings, weights),
          maxTokens: 500,
          temperature: 0.2,
        },
        { signal: controller.signal },
      );
      const output = parseModelOutput(SynthesisOutputSchema, raw);
      return {
        verdict: output.verdict,
        confidence: tier === 'secondary' ? Math.min(output.confidence, SECONDARY_CONFIDENCE_CAP) : output.confidence,
        synthesis: output.synthesis,
        suggestedAction: output.suggested_action,
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private emit(
    type: 'SynthesisAttempted' | 'SynthesisTierFailed' | 'SynthesisCompleted',
    requestId: string | undefined,
    payload: Record<string, unknown>,
  ): void {
    this.config.eventBus?.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'Synthesizer',
      requestId,
      payload,
    });
  }
}
