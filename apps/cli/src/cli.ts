import type { Logger } from 'pino';
import { readCliConfig } from './config.js';
import { convertCsvToJson, type ConvertResult } from './convert.js';
import { withLogger } from './observability/with-logger.js';

export { readCliConfig, DEFAULT_OUTPUT_PATH, USAGE } from './config.js';
export type { CliConfig } from './config.js';
export { convertCsvToJson } from './convert.js';
export type { ConvertResult } from './convert.js';
export { serializeJobRecords, writeJobsJson } from './output.js';
export { ConfigError, OutputWriteError } from './errors.js';

/**
 * Run one conversion and map the outcome to a process exit code.
 * The failure itself is logged by withLogger as `conversion_failed`.
 */
export async function runCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  logger: Logger,
  now = new Date(),
): Promise<number> {
  try {
    const result = await withLogger<ConvertResult>({
      logger,
      operation: 'conversion',
      runId: env.RUN_ID,
      context: { args: [...argv] },
      summary: (converted) => ({ ...converted.stats, invalidRows: converted.invalidRows, outputPath: converted.outputPath }),
      run: async (runId) => {
        const config = readCliConfig(argv, env, now);
        return convertCsvToJson(config, logger, runId);
      },
    });

    logger.info({ event: 'output_written', outputPath: result.outputPath }, `Wrote structured JSON to ${result.outputPath}`);
    return 0;
  } catch (error) {
    logger.debug({ event: 'cli_exit', exitCode: 1, reason: error instanceof Error ? error.name : 'unknown' }, 'Exiting');
    return 1;
  }
}
