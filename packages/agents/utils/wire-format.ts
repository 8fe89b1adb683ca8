// snake_case wire shapes for the HTTP and --json surfaces

import type { SpecialistFinding } from '../types/findings.js';
import type { InvestigationResponse } from '../types/synthesis.js';

export interface WireFinding {
  domain: string;
  status: string;
  summary: string;
  confidence: number;
  evidence: readonly string[];
  recommendation: string;
  tools_used: readonly string[];
  latency_ms: number;
}

export interface WireInvestigationResponse {
  request_id: string;
  verdict: string;
  confidence: number;
  findings: WireFinding[];
  synthesis: string;
  suggested_action: string;
  fallback_used: boolean;
  strategy: string;
  category: string;
  latency_ms: number;
}

export function toWireFinding(f: SpecialistFinding): WireFinding {
  return {
    domain: f.domain,
    status: f.status,
    summary: f.summary,
    confidence: f.confidence,
    evidence: f.evidence,
    recommendation: f.recommendation,
    tools_used: f.toolsUsed,
    latency_ms: f.latencyMs,
  };
}

export function toWireResponse(response: InvestigationResponse): WireInvestigationResponse {
  return {
    request_id: response.requestId,
    verdict: response.verdict,
    confidence: response.confidence,
    findings: response.findings.map(toWireFinding),
    synthesis: response.synthesis,
    suggested_action: response.suggestedAction,
    fallback_used: response.fallbackUsed,
    strategy: response.strategy,
    category: response.category,
    latency_ms: response.latencyMs,
  };
}
