// Process settings: parsed once from the environment at startup and frozen
// Entry points load .env via dotenv before calling loadSettings()

import { z } from 'zod';

const optionalString = z.string().trim().optional().transform((value) => (value ? value : undefined));
const optionalUrl = optionalString.pipe(z.string().url().optional());

const SettingsSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  TRIAGE_DEADLINE_MS: z.coerce.number().int().positive().default(15_000),
  TRIAGE_SYNTHESIS_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  TRIAGE_SYNTHESIS_BUDGET_MS: z.coerce.number().int().positive().default(30_000),
  TRIAGE_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(250),
  TRIAGE_ACTIONABLE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  TRIAGE_BENIGN_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  TRIAGE_AUTHORITY_WEIGHTS_PATH: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  TRIAGE_PRIMARY_MODEL: z.string().default('claude-sonnet-4-5'),
  TRIAGE_SPECIALIST_MODEL: z.string().default('claude-haiku-4-5'),
  TRIAGE_SECONDARY_URL: optionalUrl,
  TRIAGE_SECONDARY_API_KEY: optionalString,
  TRIAGE_SECONDARY_MODEL: z.string().default('qwen2.5-coder-14b'),
  INFRASTRUCTURE_MCP_URL: optionalUrl,
  OBSERVABILITY_MCP_URL: optionalUrl,
  KNOWLEDGE_MCP_URL: optionalUrl,
  HOME_MCP_URL: optionalUrl,
  TRIAGE_MCP_TOKEN: optionalString,
}).refine((env) => env.TRIAGE_BENIGN_THRESHOLD < env.TRIAGE_ACTIONABLE_THRESHOLD, {
  message: 'TRIAGE_BENIGN_THRESHOLD must be lower than TRIAGE_ACTIONABLE_THRESHOLD',
  path: ['TRIAGE_BENIGN_THRESHOLD'],
});

export interface Settings {
  readonly port: number;
  readonly deadlineMs: number;
  readonly synthesisTimeoutMs: number;
  readonly synthesisBudgetMs: number;
  readonly retryBackoffMs: number;
  readonly thresholds: { readonly actionable: number; readonly benign: number };
  readonly authorityWeightsPath?: string;
  readonly primary: { readonly apiKey?: string; readonly model: string; readonly specialistModel: string };
  readonly secondary: { readonly baseUrl?: string; readonly apiKey?: string; readonly model: string };
  readonly toolServers: {
    readonly infrastructure?: string;
    readonly observability?: string;
    readonly knowledge?: string;
    readonly home?: string;
  };
  readonly toolServerToken?: string;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(env)'}: ${issue.message}`)
      .join('\n  ');
    throw new Error(`Invalid configuration:\n  ${detail}`);
  }

  const e = parsed.data;
  return Object.freeze({
    port: e.PORT,
    deadlineMs: e.TRIAGE_DEADLINE_MS,
    synthesisTimeoutMs: e.TRIAGE_SYNTHESIS_TIMEOUT_MS,
    synthesisBudgetMs: e.TRIAGE_SYNTHESIS_BUDGET_MS,
    retryBackoffMs: e.TRIAGE_RETRY_BACKOFF_MS,
    thresholds: Object.freeze({ actionable: e.TRIAGE_ACTIONABLE_THRESHOLD, benign: e.TRIAGE_BENIGN_THRESHOLD }),
    authorityWeightsPath: e.TRIAGE_AUTHORITY_WEIGHTS_PATH,
    primary: Object.freeze({
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.TRIAGE_PRIMARY_MODEL,
      specialistModel: e.TRIAGE_SPECIALIST_MODEL,
    }),
    secondary: Object.freeze({
      baseUrl: e.TRIAGE_SECONDARY_URL,
      apiKey: e.TRIAGE_SECONDARY_API_KEY,
      model: e.TRIAGE_SECONDARY_MODEL,
    }),
    toolServers: Object.freeze({
      infrastructure: e.INFRASTRUCTURE_MCP_URL,
      observability: e.OBSERVABILITY_MCP_URL,
      knowledge: e.KNOWLEDGE_MCP_URL,
      home: e.HOME_MCP_URL,
    }),
    toolServerToken: e.TRIAGE_MCP_TOKEN,
  });
}
