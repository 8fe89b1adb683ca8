// API server entry point

import 'dotenv/config';
import { createLogger, createOrchestrator, errorMessage, loadSettings } from '@alert-triage/agents';
import { createApp } from './app.js';

const log = createLogger('ApiServer');

function main(): void {
  const settings = loadSettings();
  const runtime = createOrchestrator(settings);
  const app = createApp({ orchestrator: runtime.orchestrator });

  const server = app.listen(settings.port, () => {
    log('info', `Listening on port ${settings.port}`, { deadlineMs: settings.deadlineMs });
  });

  const shutdown = (signal: string) => {
    log('info', `Received ${signal}, shutting down`);
    server.close(() => {
      runtime.close()
        .catch((err: unknown) => log('warn', 'Tool server disconnect failed', { error: errorMessage(err) }))
        .finally(() => process.exit(0));
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason: unknown) => {
    log('error', 'Unhandled promise rejection', { error: errorMessage(reason) });
  });
}

try {
  main();
} catch (err) {
  log('error', 'Startup failed', { error: errorMessage(err) });
  process.exit(1);
}
