import { formatIsoDate, loadVocabulary, runPipeline, type NormalizationStats } from '@jobrows/normalizer';
import { createCsvSource } from '@jobrows/source-csv';
import type { Logger } from 'pino';
import type { CliConfig } from './config.js';
import { ConfigError } from './errors.js';
import { createNormalizerLogger } from './observability/normalizer-logger.js';
import { writeJobsJson } from './output.js';

export interface ConvertResult {
  inputPath: string;
  outputPath: string;
  referenceDate: string;
  stats: NormalizationStats;
  invalidRows: number;
}

function readVocabulary(path: string | undefined): readonly string[] | undefined {
  if (!path) return undefined;

  try {
    return loadVocabulary(path);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot load vocabulary ${path}: ${message}`, { cause: error });
  }
}

/**
 * Read the CSV input, normalize it and write the JSON array of records.
 * Any failure here is fatal for the run; per-row problems never reach this level.
 */
export async function convertCsvToJson(config: CliConfig, logger: Logger, runId: string): Promise<ConvertResult> {
  const vocabulary = readVocabulary(config.vocabularyPath);
  const source = createCsvSource(config.inputPath, { delimiter: config.delimiter });

  const result = await runPipeline(source, {
    referenceDate: config.referenceDate,
    vocabulary,
    logger: createNormalizerLogger(logger, runId),
  });

  await writeJobsJson(config.outputPath, result.records);

  return {
    inputPath: config.inputPath,
    outputPath: config.outputPath,
    referenceDate: formatIsoDate(config.referenceDate),
    stats: result.stats,
    invalidRows: result.invalidRows,
  };
}
