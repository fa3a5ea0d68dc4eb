import type { Logger } from 'pino';
import { ensureRunId } from './run-id.js';

export interface SerializedError {
  name?: string;
  message: string;
  code?: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export interface WithLoggerOptions<TResult> {
  logger: Logger;
  operation: string;
  runId?: string;
  context?: Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: (runId: string) => Promise<TResult>;
}

/**
 * Log `<operation>_started`, then `<operation>_completed` or `<operation>_failed`.
 * Failures are rethrown after logging.
 */
export async function withLogger<TResult>({
  logger,
  operation,
  runId: requestedRunId,
  context,
  summary,
  run,
}: WithLoggerOptions<TResult>): Promise<TResult> {
  const runId = ensureRunId(requestedRunId);
  const startedAt = Date.now();
  const common = {
    operation,
    runId,
    ...(context ?? {}),
  };

  logger.info({ event: `${operation}_started`, ...common }, 'Run started');

  try {
    const result = await run(runId);
    logger.info(
      {
        event: `${operation}_completed`,
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Run completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: `${operation}_failed`,
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Run failed',
    );
    throw error;
  }
}
