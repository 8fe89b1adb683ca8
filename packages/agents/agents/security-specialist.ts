// Security Specialist: secrets presence, auth failures, certificates
// Tools: list_secrets, kubectl_get_events

import type { Alert } from '../types/alerts.js';
import { BaseSpecialist, type InvestigationState, type ToolStep } from './base-specialist.js';

const SECURITY_PROMPT = `You are a security specialist investigating an auth or secrets alert.

Analyze the provided secret status and auth events to determine:
1. Are required secrets present?
2. Is there an auth failure?
3. Are certificates valid?

Be concise. Focus on the actual issue.`;

/** Secret store folders searched in order until one answers */
export const SECRET_PATH_PREFIXES = ['/platform', '/infrastructure'] as const;

const AUTH_KEYWORDS = ['auth', '401', '403', 'forbidden', 'cert'];

export class SecuritySpecialist extends BaseSpecialist {
  protected readonly systemPrompt = SECURITY_PROMPT;

  constructor() {
    super('security');
  }

  protected think(alert: Alert, state: InvestigationState): ToolStep[] {
    const namespace = alert.labels.namespace || 'default';
    const workload = alert.labels.service || alert.labels.pod;
    const tools: ToolStep[] = [];

    const prefix = SECRET_PATH_PREFIXES[state.iteration - 1];
    if (workload && prefix) {
      const path = `${prefix}/${workload}`;
      tools.push({ toolName: 'list_secrets', params: { path }, label: `Secrets at ${path}` });
    }

    if (state.iteration === 1 && AUTH_KEYWORDS.some(k => alert.name.toLowerCase().includes(k))) {
      tools.push({ toolName: 'kubectl_get_events', params: { namespace }, label: 'Events' });
    }

    return tools;
  }

  /** Try the next secret folder when the first lookup failed */
  protected reflect(_alert: Alert, state: InvestigationState): boolean {
    const lookups = state.invocations.filter(i => i.toolName === 'list_secrets');
    const last = lookups[lookups.length - 1];
    return last !== undefined && last.error !== undefined && state.iteration < SECRET_PATH_PREFIXES.length;
  }
}
