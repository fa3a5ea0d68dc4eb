import type { NormalizerLogger } from '@jobrows/normalizer';
import type { Logger } from 'pino';

const STAGE_PREFIX = /^\[normalize(?::([^\]]+))?\]\s*/;

interface StageLine {
  sourceId?: string;
  message: string;
}

/**
 * `[normalize:csv] Received 4 rows` → `{sourceId: 'csv', message: 'Received 4 rows'}`.
 */
export function parseStageLine(line: string): StageLine {
  const match = STAGE_PREFIX.exec(line);
  if (!match) return { message: line };

  const sourceId = match[1];
  const message = line.slice(match[0].length);
  return sourceId ? { sourceId, message } : { message };
}

/**
 * Stage chatter goes to debug; warnings and errors keep their level.
 * Every line carries the run id of the conversion that produced it.
 */
export function createNormalizerLogger(logger: Logger, runId: string): NormalizerLogger {
  const write = (level: 'debug' | 'warn' | 'error', line: string) => {
    const { message, sourceId } = parseStageLine(line);
    logger[level]({ event: 'normalize_stage', runId, ...(sourceId ? { sourceId } : {}) }, message);
  };

  return {
    info: (line) => write('debug', line),
    warn: (line) => write('warn', line),
    error: (line) => write('error', line),
  };
}
