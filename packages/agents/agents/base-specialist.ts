// Base specialist with the think -> act -> reflect -> report loop
// All domain specialists extend this class. investigate() never rejects:
// every failure becomes an ERROR finding.

import { randomUUID } from 'node:crypto';
import type { Alert } from '../types/alerts.js';
import type {
  SpecialistCapability, SpecialistDomain, SpecialistFinding, ToolInvocation,
} from '../types/findings.js';
import type { EventBus } from '../types/events.js';
import { DOMAIN_DESCRIPTIONS, DOMAIN_TOOLS } from '../config/domain-tools.js';
import type { ToolCaller } from '../bridge/mcp-client.js';
import type { ReasoningBackend } from '../bridge/reasoning-backend.js';
import { SpecialistOutputSchema } from '../schemas/investigation.js';
import { ReasoningBackendError, ToolCallError, errorMessage } from '../utils/errors.js';
import { excerpt, parseModelOutput } from '../utils/model-output.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Specialist');

export const EVIDENCE_EXCERPT_CHARS = 500;
const ERROR_MESSAGE_CHARS = 200;

export interface SpecialistContext {
  requestId: string;
  /** Tool capability already scoped to this specialist's domain */
  callTool: ToolCaller;
  /** null when no specialist model is configured */
  backend: ReasoningBackend | null;
  signal: AbortSignal;
  eventBus: EventBus;
}

export interface ToolStep {
  toolName: string;
  params: Record<string, unknown>;
  /** Evidence heading, e.g. "Pod status" */
  label: string;
  /** Narrow the rendered result; null drops it from the evidence */
  select?: (text: string) => string | null;
}

export interface InvestigationState {
  iteration: number;
  maxIterations: number;
  invocations: ToolInvocation[];
  evidence: string[];
}

/** Render a tool result as plain text before it is excerpted */
export function renderToolResult(toolName: string, result: unknown): string {
  if (typeof result === 'string') return result;
  if (typeof result === 'object' && result !== null) {
    // REST-style bridges answer { status, output } or { status: 'error', error }
    if ('status' in result && result.status === 'error') {
      const message = 'error' in result && typeof result.error === 'string' ? result.error : 'tool returned an error';
      throw new ToolCallError(toolName, message);
    }
    if ('output' in result && typeof result.output === 'string') return result.output;
  }
  return excerpt(result, Number.MAX_SAFE_INTEGER);
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function errorFinding(
  domain: SpecialistDomain,
  err: unknown,
  latencyMs: number,
  toolsUsed: readonly string[] = [],
): SpecialistFinding {
  return Object.freeze({
    domain,
    status: 'ERROR',
    summary: `Investigation failed: ${truncate(errorMessage(err), ERROR_MESSAGE_CHARS)}`,
    confidence: 0,
    evidence: Object.freeze([]),
    recommendation: '',
    toolsUsed: Object.freeze([...toolsUsed]),
    latencyMs,
  });
}

export function timeoutFinding(domain: SpecialistDomain, deadlineMs: number): SpecialistFinding {
  return Object.freeze({
    domain,
    status: 'TIMEOUT',
    summary: `Timed out after ${deadlineMs}ms`,
    confidence: 0,
    evidence: Object.freeze([]),
    recommendation: '',
    toolsUsed: Object.freeze([]),
    latencyMs: deadlineMs,
  });
}

const OUTPUT_CONTRACT = `
Respond with a single JSON object and nothing else:
{"assessment": "PASS" | "WARN" | "FAIL", "summary": "<one or two sentences>", "confidence": <0.0-1.0>, "recommendation": "<specific action, or empty>"}
confidence is how likely it is that this alert reflects a real problem in your domain that needs action.`;

export abstract class BaseSpecialist {
  readonly domain: SpecialistDomain;
  readonly capability: SpecialistCapability;
  protected abstract readonly systemPrompt: string;

  constructor(domain: SpecialistDomain) {
    this.domain = domain;
    this.capability = {
      domain,
      tools: DOMAIN_TOOLS[domain],
      description: DOMAIN_DESCRIPTIONS[domain],
    };
  }

  async investigate(alert: Alert, ctx: SpecialistContext): Promise<SpecialistFinding> {
    const start = Date.now();
    const state: InvestigationState = {
      iteration: 0,
      maxIterations: 2,
      invocations: [],
      evidence: [],
    };
    const toolsUsed = () => state.invocations.map(i => i.toolName);

    try {
      while (state.iteration < state.maxIterations && !ctx.signal.aborted) {
        state.iteration++;

        // Think: plan tool calls from the alert and what we have so far
        const plan = this.think(alert, state);

        // Act: calls run one at a time so the abort check sits between them
        for (const step of plan) {
          if (ctx.signal.aborted) break;
          await this.act(step, ctx, state);
        }

        // Reflect: one more round only when the specialist asks for it
        if (!this.reflect(alert, state)) break;
      }

      if (ctx.signal.aborted) {
        return errorFinding(this.domain, 'investigation cancelled', Date.now() - start, toolsUsed());
      }

      // Reason
      if (!ctx.backend) {
        throw new ReasoningBackendError('specialist', 'not-configured', 'no specialist reasoning backend configured');
      }
      const raw = await ctx.backend.complete(
        {
          system: `${this.systemPrompt.trim()}\n${OUTPUT_CONTRACT}`,
          prompt: this.buildPrompt(alert, state),
          maxTokens: 500,
          temperature: 0.3,
        },
        { signal: ctx.signal },
      );
      const output = parseModelOutput(SpecialistOutputSchema, raw);

      // Report
      return Object.freeze({
        domain: this.domain,
        status: 'OK',
        summary: `${output.assessment}: ${output.summary}`,
        confidence: output.confidence,
        evidence: Object.freeze([...state.evidence]),
        recommendation: output.recommendation,
        toolsUsed: Object.freeze(toolsUsed()),
        latencyMs: Date.now() - start,
      });
    } catch (err) {
      log('warn', 'Investigation failed', {
        requestId: ctx.requestId,
        domain: this.domain,
        error: errorMessage(err),
      });
      return errorFinding(this.domain, err, Date.now() - start, toolsUsed());
    }
  }

  /** Tool calls for the current iteration */
  protected abstract think(alert: Alert, state: InvestigationState): ToolStep[];

  /** Return true to run another think/act round. Default: a single round. */
  protected reflect(_alert: Alert, _state: InvestigationState): boolean {
    return false;
  }

  protected canUseTool(toolName: string): boolean {
    return this.capability.tools.includes(toolName);
  }

  private async act(step: ToolStep, ctx: SpecialistContext, state: InvestigationState): Promise<void> {
    const { toolName, params } = step;
    const invocation: ToolInvocation = {
      invocationId: randomUUID(),
      domain: this.domain,
      toolName,
      params,
      timestamp: new Date(),
    };
    state.invocations.push(invocation);

    ctx.eventBus.emit({
      eventId: randomUUID(),
      type: 'ToolCalled',
      timestamp: new Date(),
      sourceContext: 'Specialists',
      requestId: ctx.requestId,
      payload: { domain: this.domain, toolName, params, invocationId: invocation.invocationId },
    });

    const start = Date.now();
    try {
      if (!this.canUseTool(toolName)) {
        throw new ToolCallError(toolName, `not available to the ${this.domain} specialist`);
      }
      invocation.result = await ctx.callTool(toolName, params, { signal: ctx.signal });
      invocation.duration = Date.now() - start;

      const text = renderToolResult(toolName, invocation.result);
      const selected = step.select ? step.select(text) : text;
      if (selected !== null) {
        state.evidence.push(`${step.label}:\n${excerpt(selected, EVIDENCE_EXCERPT_CHARS)}`);
      }

      ctx.eventBus.emit({
        eventId: randomUUID(),
        type: 'ToolSucceeded',
        timestamp: new Date(),
        sourceContext: 'Specialists',
        requestId: ctx.requestId,
        payload: { domain: this.domain, invocationId: invocation.invocationId, duration: invocation.duration },
      });
    } catch (err) {
      invocation.error = errorMessage(err);
      invocation.duration = Date.now() - start;
      state.evidence.push(`${step.label}: failed (${invocation.error})`);

      ctx.eventBus.emit({
        eventId: randomUUID(),
        type: 'ToolFailed',
        timestamp: new Date(),
        sourceContext: 'Specialists',
        requestId: ctx.requestId,
        payload: { domain: this.domain, invocationId: invocation.invocationId, error: invocation.error },
      });
    }
  }

  private buildPrompt(alert: Alert, state: InvestigationState): string {
    const evidence = state.evidence.length > 0
      ? state.evidence.join('\n\n')
      : `No ${this.domain} data available`;

    return [
      `Alert: ${alert.name}`,
      `Severity: ${alert.severity}`,
      `Labels: ${JSON.stringify(alert.labels)}`,
      `Description: ${alert.description || 'N/A'}`,
      '',
      'Evidence from investigation:',
      evidence,
      '',
      'Analyze this alert and provide your assessment.',
    ].join('\n');
  }
}

/** Lines of a tool output that mention any of the given terms (case-insensitive) */
export function linesMentioning(text: string, terms: readonly string[], limit: number): string[] {
  const needles = terms.map(t => t.toLowerCase());
  return text
    .split('\n')
    .filter(line => needles.some(n => line.toLowerCase().includes(n)))
    .slice(0, limit);
}
