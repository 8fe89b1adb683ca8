// Platform Specialist: pods, deployments, events, logs, crashloops, OOM kills
// Tools: kubectl_get_pods, kubectl_get_events, kubectl_logs, kubectl_get_deployments

import type { Alert } from '../types/alerts.js';
import { BaseSpecialist, linesMentioning, type ToolStep } from './base-specialist.js';

const PLATFORM_PROMPT = `You are a platform specialist investigating a Kubernetes alert.

Clusters are managed through GitOps: never suggest a manual kubectl apply.

Analyze the provided pod status, events, and logs to determine:
1. What is the root cause (OOM, crashloop, image pull, resource limits)?
2. Is this actionable or a false positive?
3. What is the recommended fix (restart, scale, check storage, etc.)?

Be concise. Focus on the actual issue, not general advice.`;

export class PlatformSpecialist extends BaseSpecialist {
  protected readonly systemPrompt = PLATFORM_PROMPT;

  constructor() {
    super('platform');
  }

  protected think(alert: Alert): ToolStep[] {
    const namespace = alert.labels.namespace || 'default';
    const pod = alert.labels.pod;
    const name = alert.name.toLowerCase();
    const tools: ToolStep[] = [];

    if (pod) {
      tools.push({ toolName: 'kubectl_get_pods', params: { namespace, name: pod }, label: 'Pod status' });
      tools.push({
        toolName: 'kubectl_get_events',
        params: { namespace, field_selector: `involvedObject.name=${pod}` },
        label: 'Events',
      });
      if (name.includes('crash') || name.includes('oom')) {
        tools.push({ toolName: 'kubectl_logs', params: { namespace, pod, tail: 30 }, label: 'Logs' });
      }
      return tools;
    }

    // No pod label: look at the workload instead
    const workload = alert.labels.deployment || alert.labels.service;
    tools.push({
      toolName: 'kubectl_get_deployments',
      params: { namespace },
      label: 'Deployment status',
      select: workload
        ? (text) => {
          const lines = linesMentioning(text, [workload], 5);
          return lines.length > 0 ? lines.join('\n') : null;
        }
        : undefined,
    });
    return tools;
  }
}
