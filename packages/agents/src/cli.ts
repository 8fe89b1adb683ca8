#!/usr/bin/env node
// Alert triage: command-line entry point
//
// Usage:
//   triage investigate --name KubePodCrashLooping --label namespace=media --label pod=plex-0
//   triage investigate --name HighLatency --severity critical --json
//   triage batch alerts.json            # request array or Alertmanager webhook payload
//   triage agents                       # specialists, tools and authority weights
//   triage --help

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { loadSettings } from '../config/settings.js';
import { TOOL_SERVERS_LIST, toolsForServer } from '../config/domain-tools.js';
import { createOrchestrator, newRequestId, type OrchestratorRuntime } from '../orchestrator/coordinator.js';
import { BatchInvestigator } from '../orchestrator/batch-investigator.js';
import { parseBatchInput } from '../schemas/alertmanager.js';
import { SEVERITIES, type InvestigationRequest } from '../types/alerts.js';
import type { InvestigationResponse } from '../types/synthesis.js';
import type { FindingStatus } from '../types/findings.js';
import { InvalidRequestError, errorMessage } from '../utils/errors.js';
import { toWireResponse } from '../utils/wire-format.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

const STATUS_COLOR: Record<FindingStatus, keyof typeof ansi> = { OK: 'green', ERROR: 'red', TIMEOUT: 'yellow' };

const VERDICT_COLOR: Record<InvestigationResponse['verdict'], keyof typeof ansi> = {
  ACTIONABLE: 'red',
  BENIGN: 'green',
  INCONCLUSIVE: 'yellow',
};

// ── Response rendering ──────────────────────────────────────────────

function printResponse(response: InvestigationResponse): void {
  console.log(`\n  ${c('bold', 'Verdict:')} ${c(VERDICT_COLOR[response.verdict], response.verdict)} ${c('dim', `(confidence ${response.confidence.toFixed(2)})`)}`);
  console.log(`  ${c('dim', `Strategy: ${response.strategy}${response.fallbackUsed ? ' (fallback)' : ''} | Category: ${response.category} | ${response.latencyMs}ms`)}\n`);
  console.log(`  ${response.synthesis}`);
  if (response.suggestedAction) {
    console.log(`\n  ${c('bold', 'Suggested action:')} ${response.suggestedAction}`);
  }

  console.log(`\n  ${c('bold', 'Findings:')}`);
  for (const f of response.findings) {
    const status = c(STATUS_COLOR[f.status], f.status.padEnd(7));
    console.log(`    ${c('cyan', f.domain.padEnd(12))} ${status} ${f.confidence.toFixed(2)}  ${f.summary}`);
    if (f.toolsUsed.length > 0) {
      console.log(`    ${' '.repeat(12)} ${c('dim', `tools: ${f.toolsUsed.join(', ')} | ${f.latencyMs}ms`)}`);
    }
  }
  console.log();
}

// ── CLI class ───────────────────────────────────────────────────────

class TriageCli {
  private runtime: OrchestratorRuntime | null = null;

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    // Handle --help / -h at top level
    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    try {
      switch (command) {
        case 'investigate':
          await this.handleInvestigate(rest);
          break;
        case 'batch':
          await this.handleBatch(rest);
          break;
        case 'agents':
          this.listAgents();
          break;
        case 'help':
          this.printHelp();
          break;
        default:
          console.error(`Unknown command: ${command}\n`);
          this.printHelp();
          process.exitCode = 1;
      }
    } finally {
      await this.runtime?.close();
    }
  }

  private connect(): OrchestratorRuntime {
    if (!this.runtime) {
      const verbose = process.env.TRIAGE_LOG_LEVEL === 'debug';
      this.runtime = createOrchestrator(loadSettings(), {
        onEvent: verbose
          ? (event) => process.stderr.write(`  ${c('magenta', `[${event.sourceContext}]`)} ${c('dim', event.type)}\n`)
          : undefined,
      });
    }
    return this.runtime;
  }

  // ── Subcommand: investigate ─────────────────────────────────────

  private async handleInvestigate(args: string[]): Promise<void> {
    let name = '';
    let severity: string | undefined;
    let description: string | undefined;
    let requestId: string | undefined;
    let json = false;
    const labels: Record<string, string> = {};

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '--name' && args[i + 1]) {
        name = args[++i];
      } else if (arg === '--severity' && args[i + 1]) {
        severity = args[++i];
      } else if (arg === '--description' && args[i + 1]) {
        description = args[++i];
      } else if (arg === '--request-id' && args[i + 1]) {
        requestId = args[++i];
      } else if (arg === '--label' && args[i + 1]) {
        const pair = args[++i];
        const eq = pair.indexOf('=');
        if (eq <= 0) {
          console.error(`  ${c('red', 'Error:')} Invalid label "${pair}". Expected key=value.\n`);
          process.exitCode = 1;
          return;
        }
        labels[pair.slice(0, eq)] = pair.slice(eq + 1);
      } else if (arg === '--json') {
        json = true;
      } else if (arg === '--help' || arg === '-h') {
        this.printInvestigateHelp();
        return;
      } else {
        console.error(`  ${c('red', 'Error:')} Unknown option "${arg}". Use "triage investigate --help" for usage.\n`);
        process.exitCode = 1;
        return;
      }
    }

    const request = {
      requestId: requestId ?? newRequestId(),
      alert: { name, labels, severity: severity ?? 'warning', description: description ?? '' },
    };

    const { orchestrator } = this.connect();
    try {
      const response = await orchestrator.investigate(narrowRequest(request));
      if (json) {
        console.log(JSON.stringify(toWireResponse(response), null, 2));
      } else {
        printResponse(response);
      }
    } catch (err) {
      if (err instanceof InvalidRequestError) {
        console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
        process.exitCode = 2;
        return;
      }
      throw err;
    }
  }

  // ── Subcommand: batch ───────────────────────────────────────────

  private async handleBatch(args: string[]): Promise<void> {
    let file: string | undefined;
    let concurrency = 3;
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '--concurrency' && args[i + 1]) {
        concurrency = Number(args[++i]);
      } else if (!arg.startsWith('-')) {
        file = arg;
      }
    }

    if (!file || args.includes('--help') || args.includes('-h')) {
      this.printBatchHelp();
      if (!file) process.exitCode = 1;
      return;
    }

    let requests: InvestigationRequest[];
    try {
      requests = parseBatchInput(JSON.parse(readFileSync(file, 'utf-8')));
    } catch (err) {
      console.error(`  ${c('red', 'Error:')} Cannot read ${file}: ${errorMessage(err)}\n`);
      process.exitCode = 2;
      return;
    }

    const { orchestrator } = this.connect();
    const batch = new BatchInvestigator(orchestrator);
    const result = await batch.run(requests, {
      concurrency,
      onProgress: (p) => {
        if (p.status === 'running') return;
        const mark = p.status === 'completed' ? c('green', '✓') : c('red', '✗');
        process.stderr.write(`  ${mark} ${p.current} ${c('dim', `(${p.completed}/${p.total})`)}\n`);
      },
    });

    console.log(result.summary);
    console.log(c('dim', `Total: ${(result.totalDurationMs / 1000).toFixed(1)}s`));
  }

  // ── Subcommand: agents ──────────────────────────────────────────

  private listAgents(): void {
    const settings = loadSettings();
    const runtime = this.connect();
    const { agents, tools, descriptions, weights } = runtime.orchestrator.describeAgents();

    console.log(`\n  ${c('bold', 'Specialists')}\n`);
    for (const domain of agents) {
      console.log(`  ${c('cyan', domain.padEnd(12))} ${descriptions[domain]}`);
      console.log(`  ${' '.repeat(12)} ${c('dim', tools[domain].join(', '))}`);
    }

    console.log(`\n  ${c('bold', 'Tool servers')}\n`);
    for (const server of TOOL_SERVERS_LIST) {
      const state = runtime.router.isConfigured(server)
        ? c('green', settings.toolServers[server] ?? '')
        : c('yellow', 'not configured');
      console.log(`  ${c('cyan', server.padEnd(15))} ${state}`);
      console.log(`  ${' '.repeat(15)} ${c('dim', toolsForServer(server).join(', '))}`);
    }

    console.log(`\n  ${c('bold', 'Authority weights')}\n`);
    for (const [category, table] of Object.entries(weights)) {
      const row = agents.map(d => `${d}=${table[d]}`).join(' ');
      console.log(`  ${c('cyan', category.padEnd(15))} ${row}`);
    }
    console.log();
  }

  // ── Help screens ────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Alert triage')} — parallel specialist investigation of alerts

  ${c('bold', 'Usage:')}
    triage investigate --name <alert> [options]   Investigate one alert
    triage batch <file.json>                      Investigate a batch of alerts
    triage agents                                 List specialists, tools and weights
    triage --help                                 Show this help

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Specialist and primary synthesis model
    TRIAGE_SECONDARY_URL          OpenAI-compatible endpoint for the secondary tier
    INFRASTRUCTURE_MCP_URL, OBSERVABILITY_MCP_URL, KNOWLEDGE_MCP_URL, HOME_MCP_URL
    TRIAGE_DEADLINE_MS            Specialist deadline (default: 15000)
    TRIAGE_LOG_LEVEL              debug | info | warn | error (default: info)
`);
  }

  private printInvestigateHelp(): void {
    console.log(`
  ${c('bold', 'triage investigate')} — Investigate one alert

  ${c('bold', 'Options:')}
    --name <alert>                Alert rule name (required)
    --severity <level>            ${SEVERITIES.join(' | ')} (default: warning)
    --label <key=value>           Alert label, repeatable
    --description <text>          Alert description
    --request-id <id>             Correlation id (default: random)
    --json                        Print the response as JSON
    -h, --help                    Show this help

  ${c('bold', 'Examples:')}
    triage investigate --name KubePodCrashLooping --label namespace=media --label pod=plex-0
    triage investigate --name HighLatency --label service=api --severity critical --json
`);
  }

  private printBatchHelp(): void {
    console.log(`
  ${c('bold', 'triage batch')} — Investigate several alerts

  ${c('bold', 'Usage:')}
    triage batch <file.json> [--concurrency <n>]

  The file holds either an array of { "request_id", "alert" } objects or an
  Alertmanager webhook payload (firing alerts only).
`);
  }
}

/** Shape CLI flags into a request; investigate() validates the rest */
function narrowRequest(input: {
  requestId: string;
  alert: { name: string; labels: Record<string, string>; severity: string; description: string };
}): InvestigationRequest {
  const severity = SEVERITIES.find(s => s === input.alert.severity.toLowerCase());
  if (!severity) {
    throw new InvalidRequestError(`Invalid severity "${input.alert.severity}" (expected ${SEVERITIES.join(', ')})`, [
      { path: 'alert.severity', message: `expected one of ${SEVERITIES.join(', ')}` },
    ]);
  }
  return { requestId: input.requestId, alert: { ...input.alert, severity } };
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new TriageCli();
cli.start().catch((err) => {
  console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
  process.exit(1);
});
