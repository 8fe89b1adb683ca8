// Tool mappings for specialist domains
// Each specialist gets a curated subset of the tools exposed by the domain MCP servers

import type { SpecialistDomain } from '../types/findings.js';

export type ToolServer = 'infrastructure' | 'observability' | 'knowledge' | 'home';

export const TOOL_SERVERS_LIST: readonly ToolServer[] = ['infrastructure', 'observability', 'knowledge', 'home'];

/** Which MCP server hosts each tool the specialists use */
export const TOOL_SERVERS: Readonly<Record<string, ToolServer>> = {
  kubectl_get_pods: 'infrastructure',
  kubectl_get_events: 'infrastructure',
  kubectl_logs: 'infrastructure',
  kubectl_get_deployments: 'infrastructure',
  kubectl_get_services: 'infrastructure',
  kubectl_get_ingresses: 'infrastructure',
  list_secrets: 'infrastructure',
  adguard_list_rewrites: 'home',
  adguard_get_query_log: 'home',
  coroot_get_recent_anomalies: 'observability',
  query_metrics_instant: 'observability',
  search_entities: 'knowledge',
  search_runbooks: 'knowledge',
};

export const DOMAIN_TOOLS: Readonly<Record<SpecialistDomain, readonly string[]>> = {
  data: ['search_entities', 'search_runbooks'],
  network: [
    'adguard_list_rewrites', 'adguard_get_query_log',
    'kubectl_get_services', 'kubectl_get_ingresses', 'kubectl_get_deployments',
  ],
  platform: ['kubectl_get_pods', 'kubectl_get_events', 'kubectl_logs', 'kubectl_get_deployments'],
  reliability: ['coroot_get_recent_anomalies', 'query_metrics_instant'],
  security: ['list_secrets', 'kubectl_get_events'],
};

export const DOMAIN_DESCRIPTIONS: Readonly<Record<SpecialistDomain, string>> = {
  data: 'Data-layer specialist: vector and graph stores, query failures, related entities and runbooks',
  network: 'Network specialist: DNS rewrites and query logs, services, ingresses, reachability',
  platform: 'Platform specialist: pods, deployments, events, logs, crashloops, OOM kills, rollouts',
  reliability: 'Reliability specialist: error rates, latency percentiles, recent anomalies',
  security: 'Security specialist: secrets presence, auth failures, certificate problems',
};

export function toolsForServer(server: ToolServer): string[] {
  return Object.entries(TOOL_SERVERS)
    .filter(([, host]) => host === server)
    .map(([tool]) => tool);
}
