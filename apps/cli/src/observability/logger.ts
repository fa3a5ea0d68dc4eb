import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'jobrows-cli';
const VALID_LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return VALID_LOG_LEVELS.find((level) => level === raw) ?? DEFAULT_LOG_LEVEL;
}

/**
 * JSON lines on stdout unless a destination is given.
 */
export function createCliLogger(env: NodeJS.ProcessEnv = process.env, destination?: DestinationStream): Logger {
  const service = env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;
  const options = {
    level: readLogLevel(env),
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    messageKey: 'message',
  };

  return destination ? pino(options, destination) : pino(options);
}
