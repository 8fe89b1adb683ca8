// Tests for the rule-based synthesis tier

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_THRESHOLDS, ruleBasedSynthesis, verdictFor, weightedConfidence,
} from '../orchestrator/rule-based-synthesis.js';
import { defaultAuthorityWeights, uniformWeights } from '../config/authority-weights.js';
import { SynthesisConfigurationError } from '../utils/errors.js';
import { makeAlert, makeFinding } from './helpers.js';

const workloadWeights = defaultAuthorityWeights().weightsFor(makeAlert()).weights;

describe('weightedConfidence', () => {
  it('is the plain mean under uniform weights', () => {
    const findings = [
      makeFinding('data', 'OK', 0.2),
      makeFinding('network', 'OK', 0.4),
      makeFinding('platform', 'OK', 0.6),
    ];
    expect(weightedConfidence(findings, uniformWeights())).toBeCloseTo(0.4, 10);
  });

  it('ignores ERROR and TIMEOUT findings', () => {
    const findings = [
      makeFinding('data', 'OK', 0.8),
      makeFinding('network', 'TIMEOUT'),
      makeFinding('security', 'ERROR'),
    ];
    expect(weightedConfidence(findings, uniformWeights())).toBe(0.8);
  });

  it('returns 0 when nothing contributes', () => {
    expect(weightedConfidence([makeFinding('data', 'ERROR')], uniformWeights())).toBe(0);
  });
});

describe('verdictFor', () => {
  it('treats both thresholds as inclusive', () => {
    expect(verdictFor(0.6, DEFAULT_THRESHOLDS)).toBe('ACTIONABLE');
    expect(verdictFor(0.3, DEFAULT_THRESHOLDS)).toBe('BENIGN');
    expect(verdictFor(0.45, DEFAULT_THRESHOLDS)).toBe('INCONCLUSIVE');
  });
});

describe('ruleBasedSynthesis', () => {
  it('weights a crashlooping pod towards the platform finding', () => {
    const findings = [
      makeFinding('data', 'OK', 0.2),
      makeFinding('network', 'OK', 0.3),
      makeFinding('platform', 'OK', 0.9, 'kubectl rollout restart deployment/litellm -n ai-platform'),
      makeFinding('reliability', 'OK', 0.7, 'Watch the error rate after the restart'),
      makeFinding('security', 'ERROR'),
    ];

    const result = ruleBasedSynthesis(findings, workloadWeights);

    // (0.3*0.2 + 0.4*0.3 + 1.0*0.9 + 0.8*0.7) / (0.3 + 0.4 + 1.0 + 0.8) = 1.64 / 2.5
    expect(result.confidence).toBe(0.656);
    expect(result.verdict).toBe('ACTIONABLE');
    expect(result.suggestedAction).toBe('kubectl rollout restart deployment/litellm -n ai-platform');
    expect(result.synthesis).toBe(
      'Weighted confidence 0.656 from 4 of 5 specialists (data, network, platform, reliability).'
      + ' Excluded: security (ERROR).',
    );
  });

  it('returns INCONCLUSIVE between the thresholds', () => {
    const findings = [
      makeFinding('data', 'OK', 0.2),
      makeFinding('network', 'OK', 0.6),
      makeFinding('platform', 'OK', 0.4),
      makeFinding('reliability', 'OK', 0.4, 'Check the dashboard'),
      makeFinding('security', 'ERROR'),
    ];

    const result = ruleBasedSynthesis(findings, uniformWeights());

    expect(result.confidence).toBe(0.4);
    expect(result.verdict).toBe('INCONCLUSIVE');
    expect(result.suggestedAction).toBe('');
  });

  it('returns BENIGN for the same findings once the benign threshold is raised to 0.4', () => {
    const findings = [
      makeFinding('data', 'OK', 0.4),
      makeFinding('network', 'OK', 0.4),
      makeFinding('platform', 'OK', 0.4),
      makeFinding('reliability', 'OK', 0.4),
      makeFinding('security', 'ERROR'),
    ];

    const result = ruleBasedSynthesis(findings, uniformWeights(), { actionable: 0.6, benign: 0.4 });

    expect(result.confidence).toBe(0.4);
    expect(result.verdict).toBe('BENIGN');
  });

  it('returns BENIGN at the benign threshold', () => {
    const findings = [
      makeFinding('data', 'OK', 0.3),
      makeFinding('network', 'TIMEOUT'),
    ];
    const result = ruleBasedSynthesis(findings, uniformWeights());
    expect(result.verdict).toBe('BENIGN');
    expect(result.confidence).toBe(0.3);
  });

  it('returns INCONCLUSIVE with zero confidence when every specialist failed', () => {
    const findings = [
      makeFinding('data', 'TIMEOUT'),
      makeFinding('network', 'ERROR'),
      makeFinding('platform', 'TIMEOUT'),
      makeFinding('reliability', 'ERROR'),
      makeFinding('security', 'ERROR'),
    ];

    const result = ruleBasedSynthesis(findings, workloadWeights);

    expect(result).toEqual({
      verdict: 'INCONCLUSIVE',
      confidence: 0,
      synthesis: 'No specialist produced a usable finding. Excluded: data (TIMEOUT), network (ERROR),'
        + ' platform (TIMEOUT), reliability (ERROR), security (ERROR).',
      suggestedAction: '',
    });
  });

  it('returns INCONCLUSIVE when every contributing domain has zero weight', () => {
    const weights = { ...uniformWeights(), data: 0, network: 0 };
    const findings = [makeFinding('data', 'OK', 0.9), makeFinding('network', 'OK', 0.9)];

    const result = ruleBasedSynthesis(findings, weights);

    expect(result.verdict).toBe('INCONCLUSIVE');
    expect(result.confidence).toBe(0);
    expect(result.synthesis).toBe('Contributing specialists (data, network) all carry zero weight for this alert.');
  });

  it('suggests the recommendation of the highest-weighted finding, keeping canonical order on ties', () => {
    const findings = [
      makeFinding('data', 'OK', 0.9, 'Reindex the collection'),
      makeFinding('network', 'OK', 0.9, 'Add a DNS rewrite'),
    ];
    expect(ruleBasedSynthesis(findings, uniformWeights()).suggestedAction).toBe('Reindex the collection');
  });

  it('is deterministic for the same inputs', () => {
    const findings = [
      makeFinding('platform', 'OK', 0.75, 'Restart'),
      makeFinding('reliability', 'OK', 0.55),
      makeFinding('security', 'TIMEOUT'),
    ];
    const first = ruleBasedSynthesis(findings, workloadWeights);
    const second = ruleBasedSynthesis(findings, workloadWeights);
    expect(second).toEqual(first);
  });

  it('honours custom thresholds', () => {
    const findings = [makeFinding('data', 'OK', 0.5)];
    expect(ruleBasedSynthesis(findings, uniformWeights(), { actionable: 0.5, benign: 0.1 }).verdict).toBe('ACTIONABLE');
  });

  it('throws a configuration error for inverted thresholds', () => {
    expect(() => ruleBasedSynthesis([], uniformWeights(), { actionable: 0.3, benign: 0.6 }))
      .toThrow(SynthesisConfigurationError);
  });

  it('throws a configuration error for a negative weight', () => {
    const weights = { ...uniformWeights(), security: -1 };
    expect(() => ruleBasedSynthesis([], weights))
      .toThrow('weight for security must be a non-negative finite number, got -1');
  });
});
