// Specialist domains and the findings they produce
// One finding per specialist per request, frozen once created

export type SpecialistDomain =
  | 'data'
  | 'network'
  | 'platform'
  | 'reliability'
  | 'security';

/** Canonical domain order used for rendering, logging and weighting */
export const SPECIALIST_DOMAINS: readonly SpecialistDomain[] = [
  'data',
  'network',
  'platform',
  'reliability',
  'security',
];

export type FindingStatus = 'OK' | 'ERROR' | 'TIMEOUT';

export interface SpecialistFinding {
  readonly domain: SpecialistDomain;
  readonly status: FindingStatus;
  readonly summary: string;
  readonly confidence: number;        // 0-1, always 0 unless status is OK
  readonly evidence: readonly string[];
  readonly recommendation: string;    // empty when the specialist has none
  readonly toolsUsed: readonly string[];
  readonly latencyMs: number;
}

export interface ToolInvocation {
  invocationId: string;
  domain: SpecialistDomain;
  toolName: string;
  params: Record<string, unknown>;
  result?: unknown;
  error?: string;
  duration?: number;     // ms
  timestamp: Date;
}

export interface SpecialistCapability {
  readonly domain: SpecialistDomain;
  readonly tools: readonly string[];   // tool names this specialist may call
  readonly description: string;
}

/** Completed-or-timed-out findings of one dispatch, keyed and ordered by domain */
export interface FindingSet {
  readonly byDomain: Readonly<Record<SpecialistDomain, SpecialistFinding>>;
  readonly ordered: readonly SpecialistFinding[];
}

export function isSpecialistDomain(value: string): value is SpecialistDomain {
  return (SPECIALIST_DOMAINS as readonly string[]).includes(value);
}

/** Build a record with one entry per domain, visiting domains in canonical order */
export function mapDomains<T>(fn: (domain: SpecialistDomain) => T): Record<SpecialistDomain, T> {
  return {
    data: fn('data'),
    network: fn('network'),
    platform: fn('platform'),
    reliability: fn('reliability'),
    security: fn('security'),
  };
}
