import type { JobRecord, RawRow, ReadResult } from '@jobrows/row-sdk';

/**
 * Canonical output keys a raw column can feed.
 */
export type CanonicalField =
  | 'job_title'
  | 'job_url'
  | 'location'
  | 'posted_date'
  | 'job_description'
  | 'salary'
  | 'tech_stack';

/**
 * A date with no time of day and no zone. `month` is 1-based.
 */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Which fields of a row degraded to null although the row had a raw value for them.
 */
export interface FieldDegrades {
  postedDate: boolean;
  salary: boolean;
  location: boolean;
}

export interface AssembledRecord {
  record: JobRecord;
  degrades: FieldDegrades;
}

/**
 * Outcome for a single record after the seen-URL check.
 */
export type DedupOutcome =
  | { action: 'emit'; record: JobRecord; index: number }
  | { action: 'skip'; record: JobRecord; index: number; reason: string };

/**
 * Per-stage counts for observability.
 */
export interface NormalizationStats {
  rows: number;
  emitted: number;
  duplicatesSkipped: number;
  withoutUrl: number;
  unparsedDates: number;
  unparsedSalaries: number;
  placeholderLocations: number;
}

export interface NormalizationResult {
  records: JobRecord[];
  stats: NormalizationStats;
  durationMs: number;
}

export interface PipelineResult extends NormalizationResult {
  sourceId: string;
  invalidRows: ReadResult['invalidCount'];
}

export interface NormalizeOptions {
  referenceDate: CalendarDate;
  /** Header labels in input order; defaults to the union of row keys. */
  headers?: readonly string[];
  /** Technology terms to scan descriptions for; defaults to the bundled list. */
  vocabulary?: readonly string[];
  logger?: NormalizerLogger;
}

/**
 * Minimal logger interface, defaults to console.
 */
export interface NormalizerLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type { JobRecord, RawRow };
