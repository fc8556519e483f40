import pino, { type LevelWithSilent, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'listing-harvest-worker';
const LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

export function readLogLevel(raw = process.env.LOG_LEVEL): LevelWithSilent {
  const normalized = raw?.trim().toLowerCase();
  if (!normalized || !isLogLevel(normalized)) {
    return DEFAULT_LOG_LEVEL;
  }

  return normalized;
}

export function createWorkerLogger(service = process.env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME): Logger {
  return pino({
    level: readLogLevel(),
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'message',
  });
}
