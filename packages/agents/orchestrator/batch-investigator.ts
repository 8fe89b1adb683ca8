// Batch investigation
// Runs N investigations with concurrency control and renders a markdown summary table.

import type { InvestigationRequest } from '../types/alerts.js';
import type { InvestigationResponse } from '../types/synthesis.js';
import { errorMessage } from '../utils/errors.js';
import type { Orchestrator } from './coordinator.js';

export interface BatchOptions {
  /** Max concurrent investigations (default: 3) */
  concurrency?: number;
  /** Progress callback */
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface BatchEntry {
  requestId: string;
  alert: string;
  response?: InvestigationResponse;
  error?: string;
  durationMs: number;
}

export interface BatchResult {
  entries: BatchEntry[];
  summary: string;
  totalDurationMs: number;
}

export type Investigate = Pick<Orchestrator, 'investigate'>;

export class BatchInvestigator {
  private readonly orchestrator: Investigate;

  constructor(orchestrator: Investigate) {
    this.orchestrator = orchestrator;
  }

  async run(requests: readonly InvestigationRequest[], options: BatchOptions = {}): Promise<BatchResult> {
    const { concurrency = 3, onProgress } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const totalStart = Date.now();
    const entries: BatchEntry[] = [];

    // Process in batches respecting concurrency limit
    for (let i = 0; i < requests.length; i += concurrency) {
      const batch = requests.slice(i, i + concurrency);

      const batchEntries = await Promise.all(batch.map(async (request): Promise<BatchEntry> => {
        const start = Date.now();
        onProgress?.({
          completed: entries.length,
          total: requests.length,
          current: request.requestId,
          status: 'running',
        });

        try {
          const response = await this.orchestrator.investigate(request);
          onProgress?.({
            completed: entries.length + 1,
            total: requests.length,
            current: request.requestId,
            status: 'completed',
          });
          return {
            requestId: request.requestId,
            alert: request.alert.name,
            response,
            durationMs: Date.now() - start,
          };
        } catch (err) {
          const error = errorMessage(err);
          onProgress?.({
            completed: entries.length + 1,
            total: requests.length,
            current: request.requestId,
            status: 'failed',
            error,
          });
          return {
            requestId: request.requestId,
            alert: request.alert.name,
            error,
            durationMs: Date.now() - start,
          };
        }
      }));

      entries.push(...batchEntries);
    }

    return {
      entries,
      summary: renderBatchSummary(entries),
      totalDurationMs: Date.now() - totalStart,
    };
  }
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

export function renderBatchSummary(entries: readonly BatchEntry[]): string {
  if (entries.length === 0) return '## Batch Investigation\n\nNo alerts to investigate.';

  const succeeded = entries.filter(e => e.response);
  const failed = entries.filter(e => !e.response);

  const lines: string[] = [
    '## Batch Investigation',
    '',
    `**Alerts investigated:** ${succeeded.length}/${entries.length}`,
    '',
    '| Request | Alert | Verdict | Confidence | Strategy | Latency |',
    '|---------|-------|---------|------------|----------|---------|',
  ];

  for (const entry of entries) {
    const r = entry.response;
    lines.push(r
      ? `| ${cell(entry.requestId)} | ${cell(entry.alert)} | ${r.verdict} | ${r.confidence.toFixed(2)} | ${r.strategy} | ${r.latencyMs}ms |`
      : `| ${cell(entry.requestId)} | ${cell(entry.alert)} | FAILED | - | - | ${entry.durationMs}ms |`);
  }
  lines.push('');

  if (failed.length > 0) {
    lines.push('### Failed Investigations');
    lines.push('');
    for (const entry of failed) {
      lines.push(`- **${entry.requestId}** (${entry.alert}): ${entry.error ?? 'unknown error'}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
