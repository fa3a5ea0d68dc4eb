export type { RowSourceManifest, ReadResult, RowSource } from './types.js';
export { defineRowSource } from './factory.js';
export { RowSourceError } from './errors.js';
export type { RowSourceErrorCode } from './errors.js';
export {
  currencyCodeSchema,
  currencySymbolSchema,
  payPeriodSchema,
  rawRowSchema,
  isoDateSchema,
  salaryInfoSchema,
  jobRecordSchema,
  validateRawRows,
} from './schema.js';
export type {
  RawRow,
  CurrencyCode,
  CurrencySymbol,
  PayPeriod,
  SalaryInfo,
  JobRecord,
  ValidateRawRowsOptions,
} from './schema.js';
