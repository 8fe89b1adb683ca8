// Zod schemas for the investigation boundary and for structured model output

import { z } from 'zod';
import type { InvestigationRequest } from '../types/alerts.js';
import { InvalidRequestError, type ValidationIssue } from '../utils/errors.js';

export const SeveritySchema = z.enum(['info', 'warning', 'critical']);

/** Scalars become strings; null and nested values are rejected */
const LabelValueSchema = z.union([z.string(), z.number().finite(), z.boolean()]).transform(String);

export const AlertSchema = z.object({
  name: z.string({ required_error: 'alert.name is required' })
    .trim()
    .min(1, 'alert.name must not be empty')
    .describe('Alert rule identifier, e.g. KubePodCrashLooping'),
  labels: z.record(z.string(), LabelValueSchema).default({}).describe('Alert labels'),
  severity: z.preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    SeveritySchema,
  ).default('warning'),
  description: z.string().nullish().transform((value) => value ?? ''),
  fingerprint: z.string().optional(),
});

/** Wire-level request body (snake_case) */
export const InvestigationRequestSchema = z.object({
  request_id: z.string({ required_error: 'request_id is required' }).min(1, 'request_id must not be empty'),
  alert: AlertSchema,
});

export type InvestigationRequestBody = z.input<typeof InvestigationRequestSchema>;

const confidence = z.coerce.number().finite().transform((value) => Math.min(1, Math.max(0, value)));

/** What a specialist model must answer with */
export const SpecialistOutputSchema = z.object({
  assessment: z.preprocess(
    (value) => (typeof value === 'string' ? value.toUpperCase() : value),
    z.enum(['PASS', 'WARN', 'FAIL']),
  ),
  summary: z.string().min(1),
  confidence,
  recommendation: z.string().nullish().transform((value) => value ?? ''),
});

export type SpecialistOutput = z.output<typeof SpecialistOutputSchema>;

/** What a synthesis model must answer with */
export const SynthesisOutputSchema = z.object({
  verdict: z.preprocess(
    (value) => (typeof value === 'string' ? value.toUpperCase() : value),
    z.enum(['ACTIONABLE', 'BENIGN', 'INCONCLUSIVE']),
  ),
  confidence,
  synthesis: z.string().min(1),
  suggested_action: z.string().nullish().transform((value) => value ?? ''),
});

export type SynthesisOutput = z.output<typeof SynthesisOutputSchema>;

/** In-process request shape (camelCase), validated the same way as the wire body */
export const InvestigationRequestInputSchema = z.object({
  requestId: z.string({ required_error: 'requestId is required' }).min(1, 'requestId must not be empty'),
  alert: AlertSchema,
});

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function invalidRequest(error: z.ZodError): InvalidRequestError {
  const issues = toIssues(error);
  return new InvalidRequestError(
    `Invalid investigation request: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
    issues,
  );
}

function freezeRequest(requestId: string, alert: z.output<typeof AlertSchema>): InvestigationRequest {
  return Object.freeze({
    requestId,
    alert: Object.freeze({
      name: alert.name,
      labels: Object.freeze({ ...alert.labels }),
      severity: alert.severity,
      description: alert.description,
      ...(alert.fingerprint ? { fingerprint: alert.fingerprint } : {}),
    }),
  });
}

/**
 * Validate a wire-level request body and convert it to an InvestigationRequest.
 * Throws InvalidRequestError before anything is dispatched.
 */
export function parseInvestigationRequest(body: unknown): InvestigationRequest {
  const parsed = InvestigationRequestSchema.safeParse(body);
  if (!parsed.success) throw invalidRequest(parsed.error);
  return freezeRequest(parsed.data.request_id, parsed.data.alert);
}

/** Validate a request built in-process; applies the same defaults as the wire path */
export function validateInvestigationRequest(request: unknown): InvestigationRequest {
  const parsed = InvestigationRequestInputSchema.safeParse(request);
  if (!parsed.success) throw invalidRequest(parsed.error);
  return freezeRequest(parsed.data.requestId, parsed.data.alert);
}
