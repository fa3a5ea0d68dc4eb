import { z } from 'zod';

export const CURRENCY_CODES = ['USD', 'GBP', 'EUR'] as const;
export const CURRENCY_SYMBOLS = ['$', '£', '€'] as const;
export const PAY_PERIODS = ['Hour', 'Day', 'Week', 'Month', 'Year'] as const;

export const currencyCodeSchema = z.enum(CURRENCY_CODES);
export const currencySymbolSchema = z.enum(CURRENCY_SYMBOLS);
export const payPeriodSchema = z.enum(PAY_PERIODS);

export const rawRowSchema = z.record(z.string(), z.string());

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

export const salaryInfoSchema = z
  .object({
    display: z.string().min(1).nullable(),
    min_amount: z.number().nonnegative().nullable(),
    max_amount: z.number().nonnegative().nullable(),
    currency_code: currencyCodeSchema.nullable(),
    currency_symbol: currencySymbolSchema.nullable(),
    period: payPeriodSchema.nullable(),
  })
  .refine((salary) => salary.min_amount === null || salary.max_amount === null || salary.min_amount <= salary.max_amount, {
    message: 'min_amount must not exceed max_amount',
    path: ['min_amount'],
  });

export const jobRecordSchema = z.object({
  job_title: z.string().min(1).nullable(),
  job_url: z.string().min(1).nullable(),
  location: z.string().min(1).nullable(),
  posted_date: isoDateSchema.nullable(),
  job_description: z.string().min(1).nullable(),
  tech_stack: z.array(z.string().min(1)),
  salary: salaryInfoSchema,
  original_row: rawRowSchema,
});

export type RawRow = Readonly<z.infer<typeof rawRowSchema>>;
export type CurrencyCode = z.infer<typeof currencyCodeSchema>;
export type CurrencySymbol = z.infer<typeof currencySymbolSchema>;
export type PayPeriod = z.infer<typeof payPeriodSchema>;
export type SalaryInfo = z.infer<typeof salaryInfoSchema>;

/**
 * One normalized listing. Absent values are `null` so the record serializes
 * to JSON with every key present.
 */
export interface JobRecord extends Omit<z.infer<typeof jobRecordSchema>, 'original_row'> {
  original_row: RawRow;
}

export interface ValidateRawRowsOptions {
  onInvalid?: (issues: z.ZodIssue[], row: unknown, index: number) => void;
}

export function validateRawRows(rows: unknown[], options?: ValidateRawRowsOptions): RawRow[] {
  const valid: RawRow[] = [];

  rows.forEach((row, index) => {
    const result = rawRowSchema.safeParse(row);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, row, index);
    }
  });

  return valid;
}
