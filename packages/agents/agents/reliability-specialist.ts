// Reliability Specialist: error rates, latency percentiles, recent anomalies
// Tools: coroot_get_recent_anomalies, query_metrics_instant

import type { Alert } from '../types/alerts.js';
import { BaseSpecialist, type ToolStep } from './base-specialist.js';

const RELIABILITY_PROMPT = `You are a site reliability specialist investigating a performance or availability alert.

Metrics are PromQL-compatible; anomaly detection and service dependency
maps come from Coroot.

Analyze the provided metrics and anomalies to determine:
1. What is causing the latency or error rate?
2. Is this a transient spike or a persistent issue?
3. What is the recommended mitigation?

Be concise. Focus on the actual issue.`;

export function errorRateQuery(service: string): string {
  return `sum(rate(http_requests_total{service="${service}",status=~"5.."}[5m]))`;
}

export function p95LatencyQuery(service: string): string {
  return `histogram_quantile(0.95, rate(http_request_duration_seconds_bucket{service="${service}"}[5m]))`;
}

export class ReliabilitySpecialist extends BaseSpecialist {
  protected readonly systemPrompt = RELIABILITY_PROMPT;

  constructor() {
    super('reliability');
  }

  protected think(alert: Alert): ToolStep[] {
    const tools: ToolStep[] = [
      { toolName: 'coroot_get_recent_anomalies', params: {}, label: 'Recent anomalies' },
    ];

    const service = alert.labels.service || alert.labels.pod;
    if (service) {
      tools.push({ toolName: 'query_metrics_instant', params: { query: errorRateQuery(service) }, label: 'Error rate' });
      tools.push({ toolName: 'query_metrics_instant', params: { query: p95LatencyQuery(service) }, label: 'P95 latency' });
    }

    return tools;
  }
}
