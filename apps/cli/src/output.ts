import { writeFile } from 'node:fs/promises';
import type { JobRecord } from '@jobrows/row-sdk';
import { OutputWriteError } from './errors.js';

/**
 * Fixed key order, whatever order the record was built in.
 */
function toOutputRecord(record: JobRecord): JobRecord {
  const { salary } = record;
  return {
    job_title: record.job_title,
    job_url: record.job_url,
    location: record.location,
    posted_date: record.posted_date,
    job_description: record.job_description,
    tech_stack: [...record.tech_stack],
    salary: {
      display: salary.display,
      min_amount: salary.min_amount,
      max_amount: salary.max_amount,
      currency_code: salary.currency_code,
      currency_symbol: salary.currency_symbol,
      period: salary.period,
    },
    original_row: record.original_row,
  };
}

export function serializeJobRecords(records: readonly JobRecord[]): string {
  return `${JSON.stringify(records.map(toOutputRecord), null, 2)}\n`;
}

export async function writeJobsJson(path: string, records: readonly JobRecord[]): Promise<void> {
  try {
    await writeFile(path, serializeJobRecords(records), 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new OutputWriteError(path, `Cannot write output file ${path}: ${message}`, { cause: error });
  }
}
