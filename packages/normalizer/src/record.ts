import type { JobRecord, RawRow } from '@jobrows/row-sdk';
import type { ColumnResolver } from './columns.js';
import { normalizeDate } from './dates.js';
import { cleanDescription, normalizeWhitespace } from './description.js';
import { normalizeLocation } from './location.js';
import { parseSalary } from './salary.js';
import { extractTechStack } from './tech-stack.js';
import type { AssembledRecord, CalendarDate } from './types.js';

export interface AssembleContext {
  resolver: ColumnResolver;
  referenceDate: CalendarDate;
  vocabulary: readonly string[];
}

function nonEmpty(value: string): string | null {
  return value ? value : null;
}

/**
 * Normalize one raw row. Pure: never looks at other rows and never throws for
 * bad cell values; a field that cannot be read becomes null.
 */
export function assembleRecord(row: RawRow, context: AssembleContext): AssembledRecord {
  const { resolver, referenceDate, vocabulary } = context;

  const titleRaw = resolver.resolve(row, 'job_title');
  const urlRaw = resolver.resolve(row, 'job_url');
  const locationRaw = resolver.resolve(row, 'location');
  const postedRaw = resolver.resolve(row, 'posted_date');
  const salaryRaw = resolver.resolve(row, 'salary');

  const description = cleanDescription(resolver.resolve(row, 'job_description'));
  const postedDate = normalizeDate(postedRaw, referenceDate);
  const location = normalizeLocation(locationRaw);
  const salary = parseSalary(salaryRaw, description);

  const record: JobRecord = {
    job_title: titleRaw ? nonEmpty(normalizeWhitespace(titleRaw)) : null,
    job_url: urlRaw ? nonEmpty(urlRaw.trim()) : null,
    location,
    posted_date: postedDate,
    job_description: nonEmpty(description),
    tech_stack: extractTechStack(resolver.resolve(row, 'tech_stack'), description, vocabulary),
    salary,
    original_row: Object.freeze({ ...row }),
  };

  return {
    record,
    degrades: {
      postedDate: postedRaw !== null && postedDate === null,
      salary: salaryRaw !== null && salary.min_amount === null,
      location: locationRaw !== null && location === null,
    },
  };
}
