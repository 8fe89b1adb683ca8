// Dispatcher: fans one alert out to every specialist under a shared deadline
// Stragglers are aborted together when the deadline fires; their slots become TIMEOUT findings.
// dispatch() never rejects because of a specialist.

import { randomUUID } from 'node:crypto';
import type { Alert } from '../types/alerts.js';
import type { FindingSet, SpecialistDomain, SpecialistFinding } from '../types/findings.js';
import { SPECIALIST_DOMAINS, mapDomains } from '../types/findings.js';
import type { EventBus } from '../types/events.js';
import type { SpecialistContext } from '../agents/base-specialist.js';
import { errorFinding, timeoutFinding } from '../agents/base-specialist.js';
import { scopeToolCaller, type ToolCaller } from '../bridge/mcp-client.js';
import type { ReasoningBackend } from '../bridge/reasoning-backend.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Dispatcher');

export const DEFAULT_DEADLINE_MS = 15_000;

/** What the dispatcher needs from a specialist */
export interface Investigator {
  readonly domain: SpecialistDomain;
  investigate(alert: Alert, ctx: SpecialistContext): Promise<SpecialistFinding>;
}

export interface DispatcherConfig {
  specialists: Record<SpecialistDomain, Investigator>;
  callTool: ToolCaller;
  backend: ReasoningBackend | null;
  eventBus: EventBus;
  deadlineMs?: number;
}

export interface DispatchOptions {
  requestId?: string;
  /** Caller cancellation, chained into the dispatch controller */
  signal?: AbortSignal;
}

type SlotOutcome = { kind: 'finding'; finding: SpecialistFinding } | { kind: 'cut-off' };

/** Keep the finding invariants whatever a specialist hands back */
function normalizeFinding(domain: SpecialistDomain, finding: SpecialistFinding): SpecialistFinding {
  if (finding.domain !== domain) {
    return errorFinding(domain, `specialist reported domain "${finding.domain}"`, finding.latencyMs, finding.toolsUsed);
  }
  if (finding.status === 'OK' && !Number.isFinite(finding.confidence)) {
    return errorFinding(domain, `specialist reported confidence ${finding.confidence}`, finding.latencyMs, finding.toolsUsed);
  }
  const confidence = finding.status === 'OK' ? Math.min(1, Math.max(0, finding.confidence)) : 0;
  if (confidence === finding.confidence && Object.isFrozen(finding)) return finding;
  return Object.freeze({ ...finding, confidence });
}

export class Dispatcher {
  readonly deadlineMs: number;
  private readonly config: DispatcherConfig;

  constructor(config: DispatcherConfig) {
    this.config = config;
    this.deadlineMs = config.deadlineMs ?? DEFAULT_DEADLINE_MS;
  }

  get domains(): readonly SpecialistDomain[] {
    return SPECIALIST_DOMAINS;
  }

  async dispatch(alert: Alert, options: DispatchOptions = {}): Promise<FindingSet> {
    const requestId = options.requestId ?? randomUUID();
    const { eventBus } = this.config;
    const deadlineMs = this.deadlineMs;
    const start = Date.now();

    const controller = new AbortController();
    let timedOut = false;
    const cutOff = new Promise<SlotOutcome>((resolve) => {
      controller.signal.addEventListener('abort', () => resolve({ kind: 'cut-off' }), { once: true });
    });

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`deadline of ${deadlineMs}ms exceeded`));
    }, deadlineMs);

    const external = options.signal;
    const onExternalAbort = () => controller.abort(external?.reason);
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    try {
      const ordered = await Promise.all(SPECIALIST_DOMAINS.map(async (domain): Promise<SpecialistFinding> => {
        const specialist = this.config.specialists[domain];
        const started = Date.now();

        eventBus.emit({
          eventId: randomUUID(),
          type: 'SpecialistDispatched',
          timestamp: new Date(),
          sourceContext: 'Dispatcher',
          requestId,
          payload: { domain, deadlineMs },
        });

        // A synchronous throw inside investigate() lands in the catch too
        const run = Promise.resolve()
          .then(() => specialist.investigate(alert, {
            requestId,
            callTool: scopeToolCaller(this.config.callTool, domain),
            backend: this.config.backend,
            signal: controller.signal,
            eventBus,
          }))
          .then(
            (finding): SlotOutcome => ({ kind: 'finding', finding: normalizeFinding(domain, finding) }),
            (err: unknown): SlotOutcome => ({ kind: 'finding', finding: errorFinding(domain, err, Date.now() - started) }),
          );

        const outcome = await Promise.race([run, cutOff]);

        if (outcome.kind === 'cut-off') {
          const finding = timedOut
            ? timeoutFinding(domain, deadlineMs)
            : errorFinding(domain, 'dispatch cancelled', Date.now() - started);
          eventBus.emit({
            eventId: randomUUID(),
            type: 'SpecialistTimedOut',
            timestamp: new Date(),
            sourceContext: 'Dispatcher',
            requestId,
            payload: { domain, deadlineMs, cancelled: !timedOut },
          });
          return finding;
        }

        eventBus.emit({
          eventId: randomUUID(),
          type: 'FindingRecorded',
          timestamp: new Date(),
          sourceContext: 'Dispatcher',
          requestId,
          payload: { domain, status: outcome.finding.status, confidence: outcome.finding.confidence },
        });
        return outcome.finding;
      }));

      const counts = { OK: 0, ERROR: 0, TIMEOUT: 0 };
      for (const finding of ordered) counts[finding.status]++;
      log(counts.OK === ordered.length ? 'info' : 'warn', 'Dispatch complete', {
        requestId,
        ok: counts.OK,
        error: counts.ERROR,
        timeout: counts.TIMEOUT,
        elapsedMs: Date.now() - start,
      });

      return Object.freeze({
        byDomain: Object.freeze(mapDomains((domain) => ordered[SPECIALIST_DOMAINS.indexOf(domain)])),
        ordered: Object.freeze(ordered),
      });
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
    }
  }
}
