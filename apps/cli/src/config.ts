import { parseArgs } from 'node:util';
import { parseIsoDate, toCalendarDate, type CalendarDate } from '@jobrows/normalizer';
import { ConfigError } from './errors.js';

export const DEFAULT_OUTPUT_PATH = 'jobs.json';
export const USAGE =
  'Usage: jobrows <input.csv> [output.json] [--reference-date YYYY-MM-DD] [--vocabulary terms.json] [--delimiter ,]';

export interface CliConfig {
  inputPath: string;
  outputPath: string;
  referenceDate: CalendarDate;
  vocabularyPath?: string;
  delimiter: string;
}

function readOptionalEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readReferenceDate(raw: string | undefined, now: Date): CalendarDate {
  if (!raw) {
    return toCalendarDate(now);
  }

  const parsed = parseIsoDate(raw);
  if (!parsed) {
    throw new ConfigError(`Invalid reference date "${raw}", expected YYYY-MM-DD`);
  }

  return parsed;
}

function parseCliArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        'reference-date': { type: 'string' },
        vocabulary: { type: 'string' },
        delimiter: { type: 'string' },
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${message}\n${USAGE}`, { cause: error });
  }
}

/**
 * Resolve CLI settings from argv, then environment, then defaults.
 *
 * - `--reference-date` / `REFERENCE_DATE`: date relative phrases resolve against (default: today, local time)
 * - `--vocabulary` / `TECH_VOCABULARY_PATH`: JSON array of technology terms
 * - `--delimiter`: CSV field delimiter (default `,`)
 */
export function readCliConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env, now = new Date()): CliConfig {
  const { values, positionals } = parseCliArgs(argv);

  const [inputPath, outputPath, ...extra] = positionals;
  if (!inputPath) {
    throw new ConfigError(`Missing input path\n${USAGE}`);
  }
  if (extra.length > 0) {
    throw new ConfigError(`Unexpected arguments: ${extra.join(' ')}\n${USAGE}`);
  }

  const delimiter = values.delimiter ?? ',';
  if (delimiter.length === 0) {
    throw new ConfigError('Delimiter must not be empty');
  }

  return {
    inputPath,
    outputPath: outputPath ?? DEFAULT_OUTPUT_PATH,
    referenceDate: readReferenceDate(values['reference-date'] ?? readOptionalEnv(env, 'REFERENCE_DATE'), now),
    vocabularyPath: values.vocabulary ?? readOptionalEnv(env, 'TECH_VOCABULARY_PATH'),
    delimiter,
  };
}
