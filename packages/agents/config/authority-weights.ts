// Authority weighting table
// Maps an alert to a category and the relative trust given to each specialist domain for it.
// Resolution: exact alert name -> label patterns -> uniform default.
// Loaded once at startup and frozen; synthesis only ever reads it.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Alert } from '../types/alerts.js';
import { SPECIALIST_DOMAINS, isSpecialistDomain, mapDomains } from '../types/findings.js';
import type { DomainWeights, ResolvedWeights } from '../types/synthesis.js';

export const DEFAULT_CATEGORY = 'default';

/** Weight given to a domain a category rule does not mention */
export const UNLISTED_DOMAIN_WEIGHT = 0.5;

const AuthorityRuleSchema = z.object({
  category: z.string().min(1),
  alertNames: z.array(z.string().min(1)).optional(),
  labelPatterns: z.record(z.string(), z.string()).optional(),
  weights: z.record(z.string(), z.number().finite().nonnegative()),
}).superRefine((rule, ctx) => {
  if (!rule.alertNames?.length && !Object.keys(rule.labelPatterns ?? {}).length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `category "${rule.category}" needs alertNames or labelPatterns`,
    });
  }
  for (const domain of Object.keys(rule.weights)) {
    if (!isSpecialistDomain(domain)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['weights', domain],
        message: `unknown domain "${domain}" (expected one of ${SPECIALIST_DOMAINS.join(', ')})`,
      });
    }
  }
  for (const [label, pattern] of Object.entries(rule.labelPatterns ?? {})) {
    try {
      new RegExp(pattern);
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['labelPatterns', label],
        message: `invalid regular expression "${pattern}"`,
      });
    }
  }
});

export const AuthorityTableSchema = z.object({
  rules: z.array(AuthorityRuleSchema),
});

export type AuthorityRule = z.input<typeof AuthorityRuleSchema>;
export type AuthorityTableConfig = z.input<typeof AuthorityTableSchema>;

interface CompiledRule {
  readonly category: string;
  readonly alertNames: ReadonlySet<string>;
  readonly labelPatterns: ReadonlyArray<readonly [string, RegExp]>;
  readonly weights: DomainWeights;
}

export function uniformWeights(value = 1.0): DomainWeights {
  return Object.freeze(mapDomains(() => value));
}

function completeWeights(partial: Record<string, number>): DomainWeights {
  return Object.freeze(mapDomains((domain) => partial[domain] ?? UNLISTED_DOMAIN_WEIGHT));
}

export class AuthorityWeightTable {
  private readonly rules: readonly CompiledRule[];
  private readonly fallback: ResolvedWeights = Object.freeze({
    category: DEFAULT_CATEGORY,
    weights: uniformWeights(1.0),
  });

  private constructor(rules: CompiledRule[]) {
    this.rules = Object.freeze(rules);
  }

  /** Validate and compile a table. Throws with every problem listed. */
  static fromConfig(config: unknown): AuthorityWeightTable {
    const parsed = AuthorityTableSchema.safeParse(config);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid authority weight table: ${detail}`);
    }

    const compiled = parsed.data.rules.map((rule): CompiledRule => Object.freeze({
      category: rule.category,
      alertNames: new Set(rule.alertNames ?? []),
      labelPatterns: Object.entries(rule.labelPatterns ?? {})
        .map(([label, pattern]) => [label, new RegExp(`^(?:${pattern})$`)] as const),
      weights: completeWeights(rule.weights),
    }));
    return new AuthorityWeightTable(compiled);
  }

  /** A table with no rules: every alert gets uniform weights. */
  static uniform(): AuthorityWeightTable {
    return new AuthorityWeightTable([]);
  }

  weightsFor(alert: Alert): ResolvedWeights {
    const byName = this.rules.find((rule) => rule.alertNames.has(alert.name));
    if (byName) return { category: byName.category, weights: byName.weights };

    const byLabels = this.rules.find((rule) =>
      rule.labelPatterns.length > 0
      && rule.labelPatterns.every(([label, pattern]) => {
        const value = alert.labels[label];
        return value !== undefined && pattern.test(value);
      }),
    );
    if (byLabels) return { category: byLabels.category, weights: byLabels.weights };

    return this.fallback;
  }

  /** Category name -> weights, for the agents listing */
  describe(): Record<string, DomainWeights> {
    const table: Record<string, DomainWeights> = {};
    for (const rule of this.rules) {
      if (!(rule.category in table)) table[rule.category] = rule.weights;
    }
    table[DEFAULT_CATEGORY] = this.fallback.weights;
    return table;
  }
}

export function loadAuthorityWeights(path: string): AuthorityWeightTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new Error(
      `Cannot read authority weight table at ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return AuthorityWeightTable.fromConfig(raw);
}

/** Built-in categories used when no table file is configured */
export const DEFAULT_AUTHORITY_RULES: AuthorityTableConfig = {
  rules: [
    {
      category: 'workload',
      alertNames: [
        'KubePodCrashLooping', 'KubePodNotReady', 'KubeContainerOOMKilled',
        'KubeDeploymentReplicasMismatch', 'KubeJobFailed',
      ],
      weights: { platform: 1.0, reliability: 0.8, security: 0.5, network: 0.4, data: 0.3 },
    },
    {
      category: 'connectivity',
      alertNames: ['TargetDown', 'BlackboxProbeFailed', 'DNSResolutionFailure', 'IngressUnreachable'],
      labelPatterns: { job: 'blackbox.*|dns.*' },
      weights: { network: 1.0, platform: 0.7, reliability: 0.7, security: 0.3, data: 0.2 },
    },
    {
      category: 'security',
      alertNames: ['CertificateExpiringSoon', 'AuthenticationFailuresHigh', 'SecretMissing'],
      labelPatterns: { category: 'security|auth' },
      weights: { security: 1.0, platform: 0.6, network: 0.5, reliability: 0.4, data: 0.2 },
    },
    {
      category: 'performance',
      alertNames: ['HighErrorRate', 'HighLatency', 'SLOBurnRateHigh'],
      labelPatterns: { slo: '.+' },
      weights: { reliability: 1.0, platform: 0.8, network: 0.6, data: 0.5, security: 0.2 },
    },
    {
      category: 'data-store',
      labelPatterns: { namespace: 'qdrant|neo4j|postgres.*|database' },
      weights: { data: 1.0, platform: 0.7, reliability: 0.6, network: 0.4, security: 0.3 },
    },
  ],
};

export function defaultAuthorityWeights(): AuthorityWeightTable {
  return AuthorityWeightTable.fromConfig(DEFAULT_AUTHORITY_RULES);
}
