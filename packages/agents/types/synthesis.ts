// Synthesis output and the response assembled by the orchestrator

import type { SpecialistDomain, SpecialistFinding } from './findings.js';

export type Verdict = 'ACTIONABLE' | 'BENIGN' | 'INCONCLUSIVE';
export type SynthesisTier = 'primary' | 'secondary' | 'rule-based';
export type SynthesisStrategy = SynthesisTier | 'none';
/** `exhausted`: the synthesis budget ran out or the caller cancelled, so no model tier can run */
export type FailureKind = 'transient' | 'rate-limited' | 'unavailable' | 'exhausted';

export type DomainWeights = Readonly<Record<SpecialistDomain, number>>;

export interface ResolvedWeights {
  readonly category: string;
  readonly weights: DomainWeights;
}

export interface TierAttempt {
  readonly tier: SynthesisTier;
  readonly attempt: number;            // 1 or 2
  readonly outcome: 'success' | FailureKind | 'fatal';
  readonly error?: string;
  readonly durationMs: number;
}

export interface SynthesisResult {
  readonly verdict: Verdict;
  readonly confidence: number;         // 0-1
  readonly synthesis: string;
  readonly suggestedAction: string;    // empty when there is nothing to suggest
  readonly fallbackUsed: boolean;
  readonly strategy: SynthesisStrategy;
  readonly attempts: readonly TierAttempt[];
}

export interface InvestigationResponse {
  readonly requestId: string;
  readonly verdict: Verdict;
  readonly confidence: number;
  readonly findings: readonly SpecialistFinding[];
  readonly synthesis: string;
  readonly suggestedAction: string;
  readonly fallbackUsed: boolean;
  readonly strategy: SynthesisStrategy;
  readonly category: string;
  readonly latencyMs: number;
}

/** The verdict part of a synthesis, as produced by a single tier */
export type TierVerdict = Pick<SynthesisResult, 'verdict' | 'confidence' | 'synthesis' | 'suggestedAction'>;
