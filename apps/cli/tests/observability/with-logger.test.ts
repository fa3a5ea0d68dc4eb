import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { serializeError, withLogger } from '../../src/observability/with-logger.js';

function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

describe('withLogger', () => {
  it('logs start/completion and returns handler result', async () => {
    const logger = createLoggerMock();

    const result = await withLogger({
      logger,
      operation: 'conversion',
      runId: 'run-1',
      context: { inputPath: 'jobs.csv' },
      summary: () => ({ emitted: 5 }),
      run: async (runId) => ({ ok: true, runId }),
    });

    expect(result).toEqual({ ok: true, runId: 'run-1' });
    expect(vi.mocked(logger.info)).toHaveBeenCalledTimes(2);

    const [startPayload, startMessage] = vi.mocked(logger.info).mock.calls[0] ?? [];
    expect(startPayload).toEqual({
      event: 'conversion_started',
      operation: 'conversion',
      runId: 'run-1',
      inputPath: 'jobs.csv',
    });
    expect(startMessage).toBe('Run started');

    const [completedPayload] = vi.mocked(logger.info).mock.calls[1] ?? [];
    expect(completedPayload).toMatchObject({
      event: 'conversion_completed',
      runId: 'run-1',
      emitted: 5,
      durationMs: expect.any(Number),
    });
  });

  it('generates a run id when none is given', async () => {
    const logger = createLoggerMock();
    const runId = await withLogger({ logger, operation: 'conversion', run: async (id) => id });

    expect(runId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('logs failure and rethrows', async () => {
    const logger = createLoggerMock();

    await expect(
      withLogger({
        logger,
        operation: 'conversion',
        run: async () => {
          throw new Error('boom');
        },
      }),
    ).rejects.toThrow('boom');

    expect(vi.mocked(logger.error)).toHaveBeenCalledTimes(1);
    const [errorPayload] = vi.mocked(logger.error).mock.calls[0] ?? [];
    expect(errorPayload).toMatchObject({
      event: 'conversion_failed',
      operation: 'conversion',
      error: { name: 'Error', message: 'boom' },
    });
  });
});

describe('serializeError', () => {
  it('keeps a string error code', () => {
    const error = Object.assign(new Error('gone'), { code: 'ENOENT' });
    expect(serializeError(error)).toMatchObject({ name: 'Error', message: 'gone', code: 'ENOENT' });
  });

  it('stringifies non-errors', () => {
    expect(serializeError('plain')).toEqual({ message: 'plain' });
  });
});
