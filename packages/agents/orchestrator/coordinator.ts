// Orchestrator: validate, weigh, dispatch, synthesize, assemble
// Holds only frozen, shared pieces; all per-request state lives inside investigate()

import { randomUUID } from 'node:crypto';
import type { InvestigationRequest } from '../types/alerts.js';
import type { SpecialistDomain } from '../types/findings.js';
import { SPECIALIST_DOMAINS, mapDomains } from '../types/findings.js';
import type { DomainWeights, InvestigationResponse, SynthesisResult } from '../types/synthesis.js';
import type { DomainEvent, EventBus } from '../types/events.js';
import { DOMAIN_EVENT_TYPES, SimpleEventBus } from '../types/events.js';
import { DOMAIN_DESCRIPTIONS, DOMAIN_TOOLS } from '../config/domain-tools.js';
import {
  AuthorityWeightTable, defaultAuthorityWeights, loadAuthorityWeights,
} from '../config/authority-weights.js';
import type { Settings } from '../config/settings.js';
import { McpToolRouter, type ToolCaller } from '../bridge/mcp-client.js';
import type { ReasoningBackend } from '../bridge/reasoning-backend.js';
import { createAnthropicBackend } from '../bridge/anthropic-backend.js';
import { createOpenAiCompatibleBackend } from '../bridge/openai-compatible-backend.js';
import { validateInvestigationRequest } from '../schemas/investigation.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { Dispatcher, type Investigator } from './dispatcher.js';
import { Synthesizer } from './synthesizer.js';
import type { RuleBasedThresholds } from './rule-based-synthesis.js';
import { createSpecialist } from './specialist-factory.js';

const log = createLogger('Orchestrator');

export interface OrchestratorConfig {
  callTool: ToolCaller;
  /** Model used by the specialists; null leaves every finding as ERROR */
  specialistBackend: ReasoningBackend | null;
  primary: ReasoningBackend | null;
  secondary: ReasoningBackend | null;
  authority?: AuthorityWeightTable;
  deadlineMs?: number;
  synthesisTimeoutMs?: number;
  synthesisBudgetMs?: number;
  retryBackoffMs?: number;
  thresholds?: RuleBasedThresholds;
  /** Replace individual specialists (e.g. fakes in tests) */
  specialists?: Partial<Record<SpecialistDomain, Investigator>>;
  onEvent?: (event: DomainEvent) => void;
}

export interface InvestigateOptions {
  signal?: AbortSignal;
}

export interface AgentsDescription {
  agents: readonly SpecialistDomain[];
  tools: Readonly<Record<SpecialistDomain, readonly string[]>>;
  descriptions: Readonly<Record<SpecialistDomain, string>>;
  weights: Record<string, DomainWeights>;
}

export class Orchestrator {
  private readonly eventBus: EventBus;
  private readonly authority: AuthorityWeightTable;
  private readonly dispatcher: Dispatcher;
  private readonly synthesizer: Synthesizer;

  constructor(config: OrchestratorConfig) {
    this.eventBus = new SimpleEventBus();
    this.authority = config.authority ?? defaultAuthorityWeights();

    const overrides = config.specialists ?? {};
    this.dispatcher = new Dispatcher({
      specialists: mapDomains((domain) => overrides[domain] ?? createSpecialist(domain)),
      callTool: config.callTool,
      backend: config.specialistBackend,
      eventBus: this.eventBus,
      deadlineMs: config.deadlineMs,
    });

    this.synthesizer = new Synthesizer({
      primary: config.primary,
      secondary: config.secondary,
      thresholds: config.thresholds,
      timeoutMs: config.synthesisTimeoutMs,
      budgetMs: config.synthesisBudgetMs,
      retryBackoffMs: config.retryBackoffMs,
      eventBus: this.eventBus,
    });

    if (config.onEvent) {
      const handler = config.onEvent;
      for (const type of DOMAIN_EVENT_TYPES) {
        this.eventBus.on(type, handler);
      }
    }
  }

  /**
   * Run one investigation. Rejects only with InvalidRequestError (nothing dispatched)
   * or on an unexpected internal fault.
   */
  async investigate(input: InvestigationRequest, options: InvestigateOptions = {}): Promise<InvestigationResponse> {
    const start = Date.now();
    const request = validateInvestigationRequest(input);
    const { requestId, alert } = request;

    this.emit('InvestigationRequested', requestId, {
      alert: alert.name,
      severity: alert.severity,
      fingerprint: alert.fingerprint,
    });
    log('info', 'Investigation started', {
      requestId,
      alert: alert.name,
      severity: alert.severity,
      ...(alert.fingerprint ? { fingerprint: alert.fingerprint } : {}),
    });

    // 1. Resolve authority weights
    const { category, weights } = this.authority.weightsFor(alert);

    // 2. Fan out to every specialist under the shared deadline
    const findings = await this.dispatcher.dispatch(alert, { requestId, signal: options.signal });

    // 3. Synthesize; only a configuration defect gets past the fallback chain
    let synthesis: SynthesisResult;
    try {
      synthesis = await this.synthesizer.synthesize(alert, findings.ordered, weights, {
        requestId,
        signal: options.signal,
      });
    } catch (err) {
      log('error', 'Synthesis failed on every tier', { requestId, error: errorMessage(err) });
      synthesis = {
        verdict: 'INCONCLUSIVE',
        confidence: 0,
        synthesis: `Synthesis failed: ${errorMessage(err)}`,
        suggestedAction: '',
        fallbackUsed: true,
        strategy: 'none',
        attempts: [],
      };
    }

    // 4. Assemble
    const response: InvestigationResponse = Object.freeze({
      requestId,
      verdict: synthesis.verdict,
      confidence: synthesis.confidence,
      findings: findings.ordered,
      synthesis: synthesis.synthesis,
      suggestedAction: synthesis.suggestedAction,
      fallbackUsed: synthesis.fallbackUsed,
      strategy: synthesis.strategy,
      category,
      latencyMs: Date.now() - start,
    });

    this.emit('InvestigationCompleted', requestId, {
      verdict: response.verdict,
      confidence: response.confidence,
      strategy: response.strategy,
      latencyMs: response.latencyMs,
    });
    log('info', 'Investigation complete', {
      requestId,
      verdict: response.verdict,
      confidence: response.confidence,
      strategy: response.strategy,
      category,
      latencyMs: response.latencyMs,
    });

    return response;
  }

  describeAgents(): AgentsDescription {
    return {
      agents: SPECIALIST_DOMAINS,
      tools: DOMAIN_TOOLS,
      descriptions: DOMAIN_DESCRIPTIONS,
      weights: this.authority.describe(),
    };
  }

  private emit(
    type: 'InvestigationRequested' | 'InvestigationCompleted',
    requestId: string,
    payload: Record<string, unknown>,
  ): void {
    this.eventBus.emit({
      eventId: randomUUID(),
      type,
      timestamp: new Date(),
      sourceContext: 'Orchestrator',
      requestId,
      payload,
    });
  }
}

export interface OrchestratorRuntime {
  orchestrator: Orchestrator;
  router: McpToolRouter;
  /** Close tool server connections */
  close(): Promise<void>;
}

/** Wire an orchestrator from process settings: backends, tool router and weight table */
export function createOrchestrator(
  settings: Settings,
  overrides: Pick<OrchestratorConfig, 'onEvent'> = {},
): OrchestratorRuntime {
  const authority = settings.authorityWeightsPath
    ? loadAuthorityWeights(settings.authorityWeightsPath)
    : defaultAuthorityWeights();

  const router = new McpToolRouter(settings.toolServers, settings.toolServerToken);
  const primary = createAnthropicBackend({ apiKey: settings.primary.apiKey, model: settings.primary.model });
  const specialistBackend = createAnthropicBackend({
    apiKey: settings.primary.apiKey,
    model: settings.primary.specialistModel,
  });
  const secondary = createOpenAiCompatibleBackend(settings.secondary);

  if (!primary) log('warn', 'ANTHROPIC_API_KEY not set: specialists and primary synthesis are unavailable');
  if (!secondary) log('warn', 'TRIAGE_SECONDARY_URL not set: secondary synthesis is unavailable');

  const orchestrator = new Orchestrator({
    callTool: router.callTool,
    specialistBackend,
    primary,
    secondary,
    authority,
    deadlineMs: settings.deadlineMs,
    synthesisTimeoutMs: settings.synthesisTimeoutMs,
    synthesisBudgetMs: settings.synthesisBudgetMs,
    retryBackoffMs: settings.retryBackoffMs,
    thresholds: settings.thresholds,
    onEvent: overrides.onEvent,
  });

  return { orchestrator, router, close: () => router.close() };
}

/** Fresh request id for callers that have none (CLI, batch files) */
export function newRequestId(): string {
  return randomUUID();
}
