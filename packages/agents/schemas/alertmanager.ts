// Batch input: either an array of investigation requests or an Alertmanager webhook payload

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { InvestigationRequest } from '../types/alerts.js';
import { InvalidRequestError } from '../utils/errors.js';
import { parseInvestigationRequest } from './investigation.js';

const AlertmanagerAlertSchema = z.object({
  status: z.string().default('firing'),
  labels: z.record(z.string(), z.string()),
  annotations: z.record(z.string(), z.string()).default({}),
  fingerprint: z.string().optional(),
});

/** The subset of the Alertmanager webhook (version 4) we read */
export const AlertmanagerWebhookSchema = z.object({
  groupKey: z.string().optional(),
  alerts: z.array(AlertmanagerAlertSchema),
});

export type AlertmanagerWebhook = z.input<typeof AlertmanagerWebhookSchema>;

/** Firing alerts of a webhook payload as investigation requests; resolved alerts are skipped */
export function requestsFromWebhook(payload: unknown): InvestigationRequest[] {
  const parsed = AlertmanagerWebhookSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidRequestError('Not an Alertmanager webhook payload', parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })));
  }

  return parsed.data.alerts
    .filter((alert) => alert.status === 'firing')
    .map((alert, index) => {
      const { alertname, severity, ...labels } = alert.labels;
      return parseInvestigationRequest({
        request_id: alert.fingerprint ?? `${parsed.data.groupKey ?? randomUUID()}#${index}`,
        alert: {
          name: alertname,
          labels,
          severity,
          description: alert.annotations.description ?? alert.annotations.summary,
          fingerprint: alert.fingerprint,
        },
      });
    });
}

/** Accepts `[{ request_id, alert }, ...]` or an Alertmanager webhook payload */
export function parseBatchInput(input: unknown): InvestigationRequest[] {
  if (Array.isArray(input)) {
    return input.map((item: unknown, index) => {
      try {
        return parseInvestigationRequest(item);
      } catch (err) {
        if (err instanceof InvalidRequestError) {
          throw new InvalidRequestError(`Entry ${index}: ${err.message}`, err.issues);
        }
        throw err;
      }
    });
  }
  return requestsFromWebhook(input);
}
