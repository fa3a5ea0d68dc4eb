import type { RawRow, RowSource } from '@jobrows/row-sdk';
import { ColumnResolver, FIELD_ORDER } from './columns.js';
import { Deduplicator } from './dedup.js';
import { assembleRecord } from './record.js';
import { getDefaultVocabulary } from './vocabulary.js';
import type {
  JobRecord,
  NormalizationResult,
  NormalizationStats,
  NormalizeOptions,
  NormalizerLogger,
  PipelineResult,
} from './types.js';

const defaultLogger: NormalizerLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

function describeColumns(resolver: ColumnResolver, logger: NormalizerLogger): void {
  for (const field of FIELD_ORDER) {
    const headers = resolver.headersFor(field);
    if (headers.length === 0) {
      logger.info(`[normalize] No column for ${field}`);
    } else {
      logger.info(`[normalize] ${field} <- ${headers.map((h) => JSON.stringify(h)).join(', ')}`);
    }
  }
}

/**
 * Normalize and deduplicate rows in input order.
 * Stages per row: resolve columns → normalize fields → assemble → dedup.
 * Output order is the first-seen order of each unique job_url.
 */
export function normalizeRows(rows: readonly RawRow[], options: NormalizeOptions): NormalizationResult {
  const { referenceDate, logger = defaultLogger } = options;
  const start = performance.now();
  const vocabulary = options.vocabulary ?? getDefaultVocabulary();
  const resolver = options.headers ? new ColumnResolver(options.headers) : ColumnResolver.fromRows(rows);
  const deduplicator = new Deduplicator();

  const stats: NormalizationStats = {
    rows: rows.length,
    emitted: 0,
    duplicatesSkipped: 0,
    withoutUrl: 0,
    unparsedDates: 0,
    unparsedSalaries: 0,
    placeholderLocations: 0,
  };

  describeColumns(resolver, logger);

  const records: JobRecord[] = [];
  for (const row of rows) {
    const { record, degrades } = assembleRecord(row, { resolver, referenceDate, vocabulary });

    if (degrades.postedDate) stats.unparsedDates++;
    if (degrades.salary) stats.unparsedSalaries++;
    if (degrades.location) stats.placeholderLocations++;
    if (record.job_url === null) stats.withoutUrl++;

    const outcome = deduplicator.check(record);
    if (outcome.action === 'skip') {
      stats.duplicatesSkipped++;
      continue;
    }

    records.push(outcome.record);
  }
  stats.emitted = records.length;

  if (stats.duplicatesSkipped > 0) {
    logger.info(`[normalize] ${stats.duplicatesSkipped} rows skipped (duplicate job_url)`);
  }
  if (stats.withoutUrl > 0) {
    logger.warn(`[normalize] ${stats.withoutUrl} rows have no job_url and were not deduplicated`);
  }
  if (stats.unparsedDates > 0) {
    logger.warn(`[normalize] ${stats.unparsedDates} posted dates could not be parsed`);
  }
  if (stats.unparsedSalaries > 0) {
    logger.warn(`[normalize] ${stats.unparsedSalaries} salary values carried no amount`);
  }
  logger.info(`[normalize] ${stats.emitted} of ${stats.rows} rows emitted`);

  return { records, stats, durationMs: performance.now() - start };
}

/**
 * Read every row from a source and normalize it. Source errors propagate:
 * a run that cannot read its input fails as a whole.
 */
export async function runPipeline(
  source: RowSource,
  options: Omit<NormalizeOptions, 'headers'>,
): Promise<PipelineResult> {
  const { logger = defaultLogger } = options;
  const { id, name, location } = source.manifest;
  const start = performance.now();

  logger.info(`[normalize:${id}] Reading rows from ${name} (${location})...`);
  const { headers, rows, invalidCount } = await source.read();
  logger.info(`[normalize:${id}] Received ${rows.length} rows`);

  if (invalidCount > 0) {
    logger.warn(`[normalize:${id}] ${invalidCount} rows failed validation`);
  }

  const result = normalizeRows(rows, { ...options, headers, logger });

  return {
    ...result,
    sourceId: id,
    invalidRows: invalidCount,
    durationMs: performance.now() - start,
  };
}
