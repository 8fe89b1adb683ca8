// Tests for the parallel dispatcher and its shared deadline

import { describe, it, expect, vi } from 'vitest';
import { Dispatcher, type Investigator } from '../orchestrator/dispatcher.js';
import type { SpecialistContext } from '../agents/base-specialist.js';
import { SPECIALIST_DOMAINS, mapDomains, type SpecialistDomain, type SpecialistFinding } from '../types/findings.js';
import { SimpleEventBus, type DomainEvent } from '../types/events.js';
import { makeAlert, makeFinding, waitForAbort } from './helpers.js';

type Behaviour = (ctx: SpecialistContext) => Promise<SpecialistFinding>;

function specialists(overrides: Partial<Record<SpecialistDomain, Behaviour>> = {}) {
  return mapDomains((domain): Investigator => ({
    domain,
    investigate: (_alert, ctx) => {
      const behaviour = overrides[domain];
      return behaviour ? behaviour(ctx) : Promise.resolve(makeFinding(domain, 'OK', 0.6));
    },
  }));
}

function dispatcher(overrides: Partial<Record<SpecialistDomain, Behaviour>> = {}, deadlineMs = 1000) {
  const eventBus = new SimpleEventBus();
  const events: DomainEvent[] = [];
  eventBus.on('SpecialistTimedOut', (e) => events.push(e));
  eventBus.on('FindingRecorded', (e) => events.push(e));
  const instance = new Dispatcher({
    specialists: specialists(overrides),
    callTool: vi.fn().mockResolvedValue('ok'),
    backend: null,
    eventBus,
    deadlineMs,
  });
  return { instance, events };
}

describe('Dispatcher', () => {
  it('returns one finding per domain in canonical order', async () => {
    const { instance } = dispatcher();

    const result = await instance.dispatch(makeAlert(), { requestId: 'req-1' });

    expect(result.ordered.map(f => f.domain)).toEqual([...SPECIALIST_DOMAINS]);
    expect(result.ordered.every(f => f.status === 'OK')).toBe(true);
    expect(result.byDomain.network).toBe(result.ordered[1]);
    expect(Object.isFrozen(result.ordered)).toBe(true);
  });

  it('turns a specialist that misses the deadline into a TIMEOUT finding', async () => {
    let seenSignal: AbortSignal | undefined;
    const { instance, events } = dispatcher({
      network: (ctx) => {
        seenSignal = ctx.signal;
        return waitForAbort(ctx.signal);
      },
    }, 50);

    const result = await instance.dispatch(makeAlert(), { requestId: 'req-2' });

    expect(result.byDomain.network).toEqual({
      domain: 'network',
      status: 'TIMEOUT',
      summary: 'Timed out after 50ms',
      confidence: 0,
      evidence: [],
      recommendation: '',
      toolsUsed: [],
      latencyMs: 50,
    });
    expect(result.byDomain.platform.status).toBe('OK');
    expect(seenSignal?.aborted).toBe(true);
    expect(events.filter(e => e.type === 'SpecialistTimedOut').map(e => e.payload))
      .toEqual([{ domain: 'network', deadlineMs: 50, cancelled: false }]);
  });

  it('discards a result that arrives after the deadline', async () => {
    const { instance } = dispatcher({
      data: () => new Promise((resolve) => setTimeout(() => resolve(makeFinding('data', 'OK', 0.9)), 80)),
    }, 20);

    const result = await instance.dispatch(makeAlert());
    expect(result.byDomain.data.status).toBe('TIMEOUT');

    await new Promise((resolve) => setTimeout(resolve, 100));
    expect(result.byDomain.data.status).toBe('TIMEOUT');
  });

  it('returns at the deadline even when a specialist never settles', async () => {
    const { instance } = dispatcher({
      // Ignores its signal entirely
      reliability: () => new Promise<SpecialistFinding>(() => {}),
    }, 50);

    const t0 = Date.now();
    const result = await instance.dispatch(makeAlert());
    const elapsed = Date.now() - t0;

    expect(elapsed).toBeGreaterThanOrEqual(45);
    expect(elapsed).toBeLessThan(250);
    expect(result.byDomain.reliability.status).toBe('TIMEOUT');
    expect(result.ordered.filter(f => f.status === 'OK')).toHaveLength(4);
  });

  it('turns a rejected investigation into an ERROR finding', async () => {
    const { instance } = dispatcher({
      security: () => Promise.reject(new Error('vault sealed')),
    });

    const result = await instance.dispatch(makeAlert());

    expect(result.byDomain.security.status).toBe('ERROR');
    expect(result.byDomain.security.summary).toBe('Investigation failed: vault sealed');
    expect(result.byDomain.security.confidence).toBe(0);
    expect(result.ordered.filter(f => f.status === 'OK')).toHaveLength(4);
  });

  it('turns a synchronous throw into an ERROR finding', async () => {
    const { instance } = dispatcher({
      reliability: () => {
        throw new Error('bad config');
      },
    });

    const result = await instance.dispatch(makeAlert());

    expect(result.byDomain.reliability.summary).toBe('Investigation failed: bad config');
  });

  it('rejects a finding reported under another domain', async () => {
    const { instance } = dispatcher({
      platform: () => Promise.resolve(makeFinding('data', 'OK', 0.9)),
    });

    const result = await instance.dispatch(makeAlert());

    expect(result.byDomain.platform.status).toBe('ERROR');
    expect(result.byDomain.platform.summary).toBe('Investigation failed: specialist reported domain "data"');
  });

  it('clamps confidence into range and zeroes it for failed findings', async () => {
    const { instance } = dispatcher({
      data: () => Promise.resolve({ ...makeFinding('data', 'OK'), confidence: 1.7 }),
      network: () => Promise.resolve({ ...makeFinding('network', 'ERROR'), confidence: 0.4 }),
    });

    const result = await instance.dispatch(makeAlert());

    expect(result.byDomain.data.confidence).toBe(1);
    expect(result.byDomain.network.confidence).toBe(0);
  });

  it('rejects an OK finding without a numeric confidence', async () => {
    const { instance } = dispatcher({
      platform: () => Promise.resolve({ ...makeFinding('platform', 'OK'), confidence: Number.NaN }),
    });

    const result = await instance.dispatch(makeAlert());

    expect(result.byDomain.platform.status).toBe('ERROR');
    expect(result.byDomain.platform.confidence).toBe(0);
    expect(result.byDomain.platform.summary).toBe('Investigation failed: specialist reported confidence NaN');
  });

  it('scopes the tool caller to the specialist domain', async () => {
    const { instance } = dispatcher({
      network: async (ctx) => {
        await ctx.callTool('list_secrets', { path: '/platform' });
        return makeFinding('network');
      },
    });

    const result = await instance.dispatch(makeAlert());

    expect(result.byDomain.network.summary)
      .toBe('Investigation failed: list_secrets: not available to the network specialist');
  });

  it('reports cancelled dispatches as ERROR findings', async () => {
    const controller = new AbortController();
    const { instance, events } = dispatcher({
      platform: (ctx) => waitForAbort(ctx.signal),
    });

    const pending = instance.dispatch(makeAlert(), { signal: controller.signal });
    controller.abort();
    const result = await pending;

    expect(result.byDomain.platform.status).toBe('ERROR');
    expect(result.byDomain.platform.summary).toBe('Investigation failed: dispatch cancelled');
    expect(events.filter(e => e.type === 'SpecialistTimedOut').map(e => e.payload))
      .toContainEqual({ domain: 'platform', deadlineMs: 1000, cancelled: true });
  });
});
