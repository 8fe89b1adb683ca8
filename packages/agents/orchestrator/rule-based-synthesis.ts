// Rule-based synthesis: the last tier, no model involved
// Authority-weighted mean of OK finding confidences, compared against two thresholds.
// Deterministic: same findings, weights and thresholds give the same verdict.

import type { SpecialistFinding } from '../types/findings.js';
import type { DomainWeights, TierVerdict, Verdict } from '../types/synthesis.js';
import { SynthesisConfigurationError } from '../utils/errors.js';

export interface RuleBasedThresholds {
  /** weighted >= actionable -> ACTIONABLE */
  actionable: number;
  /** weighted <= benign -> BENIGN */
  benign: number;
}

export const DEFAULT_THRESHOLDS: Readonly<RuleBasedThresholds> = Object.freeze({ actionable: 0.6, benign: 0.3 });

export function validateThresholds(thresholds: RuleBasedThresholds): void {
  const { actionable, benign } = thresholds;
  for (const [name, value] of [['actionable', actionable], ['benign', benign]] as const) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new SynthesisConfigurationError(`${name} threshold must be within [0, 1], got ${value}`);
    }
  }
  if (benign >= actionable) {
    throw new SynthesisConfigurationError(
      `benign threshold (${benign}) must be lower than actionable threshold (${actionable})`,
    );
  }
}

export function validateWeights(weights: DomainWeights): void {
  for (const [domain, weight] of Object.entries(weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new SynthesisConfigurationError(`weight for ${domain} must be a non-negative finite number, got ${weight}`);
    }
  }
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/** Σ w·c / Σ w over OK findings; 0 when nothing contributes */
export function weightedConfidence(findings: readonly SpecialistFinding[], weights: DomainWeights): number {
  let weightSum = 0;
  let weighted = 0;
  for (const finding of findings) {
    if (finding.status !== 'OK') continue;
    const weight = weights[finding.domain];
    weightSum += weight;
    weighted += weight * finding.confidence;
  }
  return weightSum > 0 ? weighted / weightSum : 0;
}

export function verdictFor(confidence: number, thresholds: RuleBasedThresholds): Verdict {
  if (confidence >= thresholds.actionable) return 'ACTIONABLE';
  if (confidence <= thresholds.benign) return 'BENIGN';
  return 'INCONCLUSIVE';
}

/** Recommendation of the highest-weighted OK finding that has one; ties keep canonical order */
function suggestedActionFrom(findings: readonly SpecialistFinding[], weights: DomainWeights): string {
  let best: SpecialistFinding | undefined;
  for (const finding of findings) {
    if (finding.status !== 'OK' || !finding.recommendation) continue;
    if (!best || weights[finding.domain] > weights[best.domain]) best = finding;
  }
  return best?.recommendation ?? '';
}

export function ruleBasedSynthesis(
  findings: readonly SpecialistFinding[],
  weights: DomainWeights,
  thresholds: RuleBasedThresholds = DEFAULT_THRESHOLDS,
): TierVerdict {
  validateThresholds(thresholds);
  validateWeights(weights);

  const contributing = findings.filter(f => f.status === 'OK');
  const excluded = findings.filter(f => f.status !== 'OK');
  const totalWeight = contributing.reduce((sum, f) => sum + weights[f.domain], 0);

  const confidence = totalWeight > 0 ? round4(weightedConfidence(findings, weights)) : 0;
  const verdict: Verdict = totalWeight > 0 ? verdictFor(confidence, thresholds) : 'INCONCLUSIVE';

  const parts: string[] = [];
  if (contributing.length === 0) {
    parts.push('No specialist produced a usable finding.');
  } else if (totalWeight === 0) {
    parts.push(`Contributing specialists (${contributing.map(f => f.domain).join(', ')}) all carry zero weight for this alert.`);
  } else {
    parts.push(
      `Weighted confidence ${confidence} from ${contributing.length} of ${findings.length} specialists`
      + ` (${contributing.map(f => f.domain).join(', ')}).`,
    );
  }
  if (excluded.length > 0) {
    parts.push(`Excluded: ${excluded.map(f => `${f.domain} (${f.status})`).join(', ')}.`);
  }

  return {
    verdict,
    confidence,
    synthesis: parts.join(' '),
    suggestedAction: verdict === 'ACTIONABLE' ? suggestedActionFrom(findings, weights) : '',
  };
}
