// Network Specialist: DNS rewrites and query logs, services, ingresses, reachability
// Tools: adguard_list_rewrites, adguard_get_query_log, kubectl_get_services,
//        kubectl_get_ingresses, kubectl_get_deployments

import type { Alert } from '../types/alerts.js';
import { BaseSpecialist, linesMentioning, type ToolStep } from './base-specialist.js';

const NETWORK_PROMPT = `You are a network specialist investigating a connectivity or DNS alert.

DNS is served by AdGuard with split-DNS rewrites for specific domains; everything
else resolves through a wildcard record to the cluster load balancer.

Analyze the provided DNS records, query logs, and network state to determine:
1. Is there a DNS misconfiguration (missing rewrite, wrong IP)?
2. Is a service unreachable (ingress, deployment issue)?
3. Is this a split-DNS routing problem?

Be concise. Focus on the actual issue.`;

const CONNECTIVITY_KEYWORDS = ['dns', 'resolve', 'unreachable', 'timeout', 'connection'];

export class NetworkSpecialist extends BaseSpecialist {
  protected readonly systemPrompt = NETWORK_PROMPT;

  constructor() {
    super('network');
  }

  protected think(alert: Alert): ToolStep[] {
    const namespace = alert.labels.namespace || 'default';
    const service = alert.labels.service;
    const name = alert.name.toLowerCase();
    const tools: ToolStep[] = [];

    // DNS context is always relevant
    tools.push(service
      ? {
        toolName: 'adguard_list_rewrites',
        params: {},
        label: 'Relevant DNS rewrites',
        select: (text) => {
          const lines = linesMentioning(text, [service, namespace], 10);
          return lines.length > 0
            ? lines.join('\n')
            : `No DNS rewrite found for ${service} (may resolve through the wildcard record)`;
        },
      }
      : { toolName: 'adguard_list_rewrites', params: {}, label: 'DNS rewrites (sample)' });

    if (CONNECTIVITY_KEYWORDS.some(k => name.includes(k))) {
      const search = service || namespace;
      tools.push({
        toolName: 'adguard_get_query_log',
        params: { search, limit: 20 },
        label: `Recent DNS queries for ${search}`,
      });
    }

    if (service) {
      tools.push({ toolName: 'kubectl_get_services', params: { namespace, name: service }, label: 'Service' });
      tools.push({ toolName: 'kubectl_get_ingresses', params: { namespace }, label: 'Ingresses' });
      tools.push({
        toolName: 'kubectl_get_deployments',
        params: { namespace },
        label: 'Deployment status',
        select: (text) => {
          const lines = linesMentioning(text, [service], 5);
          return lines.length > 0 ? lines.join('\n') : null;
        },
      });
    }

    return tools;
  }
}
