// End-to-end tests for the orchestrator with in-process specialists and backends

import { describe, it, expect, vi } from 'vitest';
import { Orchestrator, createOrchestrator, type OrchestratorConfig } from '../orchestrator/coordinator.js';
import type { Investigator } from '../orchestrator/dispatcher.js';
import { loadSettings } from '../config/settings.js';
import { AuthorityWeightTable } from '../config/authority-weights.js';
import { SPECIALIST_DOMAINS, mapDomains, type SpecialistDomain, type SpecialistFinding } from '../types/findings.js';
import type { DomainEvent } from '../types/events.js';
import type { InvestigationRequest } from '../types/alerts.js';
import { InvalidRequestError } from '../utils/errors.js';
import { makeAlert, makeFinding, scriptedBackend, waitForAbort } from './helpers.js';

const crashLoopFindings: Record<SpecialistDomain, SpecialistFinding> = {
  data: makeFinding('data', 'OK', 0.2),
  network: makeFinding('network', 'OK', 0.3),
  platform: makeFinding('platform', 'OK', 0.9, 'Raise the litellm memory limit to 2Gi'),
  reliability: makeFinding('reliability', 'OK', 0.7),
  security: makeFinding('security', 'ERROR'),
};

function fakeSpecialists(findings: Record<SpecialistDomain, SpecialistFinding> = crashLoopFindings) {
  return mapDomains((domain) => {
    const investigate = vi.fn<Investigator['investigate']>(async () => findings[domain]);
    return { domain, investigate };
  });
}

function orchestrator(overrides: Partial<OrchestratorConfig> = {}) {
  const specialists = fakeSpecialists();
  const instance = new Orchestrator({
    callTool: vi.fn().mockResolvedValue(''),
    specialistBackend: null,
    primary: null,
    secondary: null,
    retryBackoffMs: 0,
    specialists,
    ...overrides,
  });
  return { instance, specialists };
}

const request: InvestigationRequest = {
  requestId: 'req-42',
  alert: makeAlert(),
};

describe('Orchestrator', () => {
  it('falls back to rule-based synthesis for a crashlooping pod when no model is available', async () => {
    const { instance } = orchestrator();

    const response = await instance.investigate(request);

    expect(response.requestId).toBe('req-42');
    expect(response.category).toBe('workload');
    expect(response.strategy).toBe('rule-based');
    expect(response.fallbackUsed).toBe(true);
    expect(response.verdict).toBe('ACTIONABLE');
    expect(response.confidence).toBe(0.656);
    expect(response.suggestedAction).toBe('Raise the litellm memory limit to 2Gi');
    expect(response.findings.map(f => f.domain)).toEqual([...SPECIALIST_DOMAINS]);
    expect(response.findings.map(f => f.status)).toEqual(['OK', 'OK', 'OK', 'OK', 'ERROR']);
    expect(response.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('reaches ACTIONABLE through rule-based scoring when both models are unreachable', async () => {
    const unreachable = () => Promise.reject(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));
    const primary = { name: 'primary', model: 'm', complete: vi.fn(unreachable) };
    const secondary = { name: 'secondary', model: 'm', complete: vi.fn(unreachable) };
    const specialists = fakeSpecialists(mapDomains((domain) => makeFinding(domain, 'OK', 0.9)));
    const { instance } = orchestrator({ primary, secondary, authority: AuthorityWeightTable.uniform(), specialists });

    const response = await instance.investigate({
      requestId: 'req-uniform',
      alert: makeAlert({ severity: 'critical' }),
    });

    expect(primary.complete).toHaveBeenCalledTimes(1);
    expect(secondary.complete).toHaveBeenCalledTimes(1);
    expect(specialists.data.investigate).toHaveBeenCalledTimes(1);
    expect(response.category).toBe('default');
    expect(response.confidence).toBe(0.9);
    expect(response.verdict).toBe('ACTIONABLE');
    expect(response.fallbackUsed).toBe(true);
    expect(response.strategy).toBe('rule-based');
  });

  it('uses the primary model when it answers', async () => {
    const primary = scriptedBackend([JSON.stringify({
      verdict: 'BENIGN',
      confidence: 0.8,
      synthesis: 'Pod recovered after one restart',
      suggested_action: '',
    })]);
    const { instance } = orchestrator({ primary: primary.backend });

    const response = await instance.investigate(request);

    expect(response.strategy).toBe('primary');
    expect(response.fallbackUsed).toBe(false);
    expect(response.verdict).toBe('BENIGN');
    expect(response.synthesis).toBe('Pod recovered after one restart');
  });

  it('rejects an alert without a name before dispatching anything', async () => {
    const { instance, specialists } = orchestrator();

    const pending = instance.investigate({ requestId: 'req-bad', alert: makeAlert({ name: '   ' }) });

    await expect(pending).rejects.toThrow(InvalidRequestError);
    await expect(pending).rejects.toThrow('Invalid investigation request: alert.name: alert.name must not be empty');
    for (const domain of SPECIALIST_DOMAINS) {
      expect(specialists[domain].investigate).not.toHaveBeenCalled();
    }
  });

  it('applies request defaults', async () => {
    const { instance, specialists } = orchestrator();

    await instance.investigate({ requestId: 'req-7', alert: { ...makeAlert(), severity: 'critical', description: '' } });

    const alert = specialists.platform.investigate.mock.calls[0]?.[0];
    expect(alert?.severity).toBe('critical');
    expect(Object.isFrozen(alert)).toBe(true);
  });

  it('records a TIMEOUT for a specialist that misses the deadline', async () => {
    const specialists = fakeSpecialists();
    const slow: Investigator = { domain: 'network', investigate: (_alert, ctx) => waitForAbort(ctx.signal) };
    const { instance } = orchestrator({ deadlineMs: 30, specialists: { ...specialists, network: slow } });

    const response = await instance.investigate(request);

    expect(response.findings[1]?.status).toBe('TIMEOUT');
    expect(response.findings[1]?.summary).toBe('Timed out after 30ms');
    // (0.3*0.2 + 1.0*0.9 + 0.8*0.7) / (0.3 + 1.0 + 0.8)
    expect(response.confidence).toBe(0.7238);
  });

  it('returns INCONCLUSIVE with strategy none when every synthesis tier fails', async () => {
    const { instance } = orchestrator({ thresholds: { actionable: 0.2, benign: 0.4 } });

    const response = await instance.investigate(request);

    expect(response.verdict).toBe('INCONCLUSIVE');
    expect(response.confidence).toBe(0);
    expect(response.strategy).toBe('none');
    expect(response.fallbackUsed).toBe(true);
    expect(response.synthesis)
      .toBe('Synthesis failed: benign threshold (0.4) must be lower than actionable threshold (0.2)');
    expect(response.findings).toHaveLength(5);
  });

  it('reports lifecycle events to the observer', async () => {
    const seen: DomainEvent[] = [];
    const { instance } = orchestrator({ onEvent: (event) => seen.push(event) });

    await instance.investigate(request);

    const types = seen.map(e => e.type);
    expect(types[0]).toBe('InvestigationRequested');
    expect(types[types.length - 1]).toBe('InvestigationCompleted');
    expect(types.filter(t => t === 'SpecialistDispatched')).toHaveLength(5);
    expect(seen.every(e => e.requestId === 'req-42')).toBe(true);
  });

  it('describes its agents, tools and weights', () => {
    const { instance } = orchestrator();

    const description = instance.describeAgents();

    expect(description.agents).toEqual(['data', 'network', 'platform', 'reliability', 'security']);
    expect(description.tools.security).toEqual(['list_secrets', 'kubectl_get_events']);
    expect(description.weights.workload?.platform).toBe(1);
    expect(description.weights.default?.data).toBe(1);
  });
});

describe('createOrchestrator', () => {
  it('degrades to ERROR findings and rule-based synthesis with nothing configured', async () => {
    const runtime = createOrchestrator(loadSettings({ TRIAGE_RETRY_BACKOFF_MS: '0' }));

    try {
      const response = await runtime.orchestrator.investigate(request);

      expect(response.findings.every(f => f.status === 'ERROR')).toBe(true);
      expect(response.findings[2]?.summary).toBe('Investigation failed: no specialist reasoning backend configured');
      expect(response.findings[2]?.evidence).toEqual([]);
      expect(response.findings[2]?.toolsUsed).toEqual(['kubectl_get_pods', 'kubectl_get_events', 'kubectl_logs']);
      expect(response.strategy).toBe('rule-based');
      expect(response.verdict).toBe('INCONCLUSIVE');
      expect(response.confidence).toBe(0);
    } finally {
      await runtime.close();
    }
  });
});
