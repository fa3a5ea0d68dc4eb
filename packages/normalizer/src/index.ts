// Pipeline
export { normalizeRows, runPipeline } from './pipeline.js';

// Individual stages
export { ColumnResolver, resolveColumn, normalizeHeader, DEFAULT_FIELD_COLUMNS, FIELD_ORDER } from './columns.js';
export type { FieldColumns } from './columns.js';
export { normalizeDate, DATE_RULES } from './dates.js';
export {
  parseSalary,
  findSalaryAmount,
  detectCurrency,
  detectPeriod,
  EMPTY_SALARY,
  SALARY_AMOUNT_RULES,
  PERIOD_RULES,
} from './salary.js';
export type { Currency, SalaryOrigin, SalaryAmountMatch } from './salary.js';
export { normalizeLocation, isPlaceholderLocation } from './location.js';
export { extractTechStack, scanTechTerms, splitTechColumn, dedupeTerms } from './tech-stack.js';
export { cleanDescription, stripHtml, decodeHtmlEntities, normalizeWhitespace } from './description.js';
export { assembleRecord } from './record.js';
export type { AssembleContext } from './record.js';
export { Deduplicator, dedup, dedupKey } from './dedup.js';
export { loadVocabulary, getDefaultVocabulary } from './vocabulary.js';
export { parseIsoDate, formatIsoDate, toCalendarDate, subtractDays, subtractMonths } from './calendar.js';

// Types
export type {
  CanonicalField,
  CalendarDate,
  FieldDegrades,
  AssembledRecord,
  DedupOutcome,
  NormalizationStats,
  NormalizationResult,
  PipelineResult,
  NormalizeOptions,
  NormalizerLogger,
} from './types.js';
