// Structured stderr logger
// Lines look like: [Dispatcher:WARN] Specialist timed out {"domain":"network"}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type Logger = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function thresholdFromEnv(): LogLevel {
  const env = process.env.TRIAGE_LOG_LEVEL?.toLowerCase();
  if (env === 'debug' || env === 'info' || env === 'warn' || env === 'error') return env;
  if (env === 'silent') return 'error';
  return 'info';
}

export function createLogger(scope: string, threshold: LogLevel = thresholdFromEnv()): Logger {
  const min = LEVEL_ORDER[threshold];
  return (level, message, data) => {
    if (LEVEL_ORDER[level] < min) return;
    const prefix = `[${scope}:${level.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  };
}
