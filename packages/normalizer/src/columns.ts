import type { CanonicalField, RawRow } from './types.js';

export interface FieldColumns {
  /** Accepted header spellings, highest priority first. */
  variants: readonly string[];
  /** Words (singular or plural) that make an otherwise unknown header feed this field. */
  keywords: readonly string[];
}

/**
 * Keyword claims go to the first field in this order, so a "Job Link Title"
 * header is read as a URL, never as a title.
 */
export const FIELD_ORDER: readonly CanonicalField[] = [
  'job_url',
  'job_description',
  'job_title',
  'location',
  'posted_date',
  'salary',
  'tech_stack',
];

export const DEFAULT_FIELD_COLUMNS: Readonly<Record<CanonicalField, FieldColumns>> = {
  job_url: {
    variants: ['job url', 'url', 'job link', 'link', 'apply url', 'application url', 'listing url'],
    keywords: ['url', 'link'],
  },
  job_description: {
    variants: ['job description html', 'description html', 'job description', 'description', 'details', 'summary'],
    keywords: ['description'],
  },
  job_title: {
    variants: ['job title', 'title', 'position', 'position title', 'role', 'job name', 'job'],
    keywords: ['title', 'position'],
  },
  location: {
    variants: ['location', 'job location', 'city', 'place', 'office'],
    keywords: ['location', 'city'],
  },
  posted_date: {
    variants: ['posted date', 'date posted', 'posted', 'posted at', 'post date', 'published', 'published date', 'date'],
    keywords: ['date', 'posted', 'published'],
  },
  salary: {
    variants: ['salary', 'salary range', 'pay', 'pay rate', 'compensation', 'rate', 'wage'],
    keywords: ['salary', 'pay', 'compensation', 'wage'],
  },
  tech_stack: {
    variants: ['tech stack', 'technologies', 'technology', 'skills', 'required skills', 'tech', 'stack'],
    keywords: ['tech', 'stack', 'skill'],
  },
};

/**
 * Case-insensitive; runs of whitespace, `_` and `-` compare equal.
 */
export function normalizeHeader(header: string): string {
  return header.toLowerCase().replace(/[\s_-]+/g, ' ').trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word test on the header's words, with camelCase split apart, so that
 * "applyUrl" carries `url` while "Company LinkedIn" does not carry `link`.
 */
export function headerHasKeyword(header: string, keyword: string): boolean {
  const words = normalizeHeader(header.replace(/([a-z0-9])([A-Z])/g, '$1 $2'));
  return new RegExp(`(?:^| )${escapeRegExp(keyword)}s?(?: |$)`).test(words);
}

/**
 * Maps canonical fields to the raw columns that may supply them. Built once per
 * run from the header list: exact variants first (in variant priority order),
 * then keyword matches (in header order).
 */
export class ColumnResolver {
  private readonly candidates = new Map<CanonicalField, string[]>();

  constructor(headers: readonly string[], columns: Readonly<Record<CanonicalField, FieldColumns>> = DEFAULT_FIELD_COLUMNS) {
    const uniqueHeaders = [...new Set(headers)];
    const exactHeaders = new Set<string>();

    for (const field of FIELD_ORDER) {
      const exact: string[] = [];
      for (const variant of columns[field].variants) {
        const key = normalizeHeader(variant);
        for (const header of uniqueHeaders) {
          if (normalizeHeader(header) === key && !exact.includes(header)) {
            exact.push(header);
            exactHeaders.add(header);
          }
        }
      }
      this.candidates.set(field, exact);
    }

    for (const header of uniqueHeaders) {
      if (exactHeaders.has(header)) continue;

      const field = FIELD_ORDER.find((candidate) =>
        columns[candidate].keywords.some((keyword) => headerHasKeyword(header, keyword)),
      );
      if (field) {
        this.candidates.get(field)?.push(header);
      }
    }
  }

  /**
   * Build a resolver from the union of the rows' keys, in first-seen order.
   */
  static fromRows(rows: readonly RawRow[], columns?: Readonly<Record<CanonicalField, FieldColumns>>): ColumnResolver {
    const headers = new Set<string>();
    for (const row of rows) {
      for (const header of Object.keys(row)) headers.add(header);
    }
    return new ColumnResolver([...headers], columns);
  }

  headersFor(field: CanonicalField): readonly string[] {
    return this.candidates.get(field) ?? [];
  }

  /**
   * First non-blank value among the field's candidate columns, as written.
   */
  resolve(row: RawRow, field: CanonicalField): string | null {
    for (const header of this.headersFor(field)) {
      const value = row[header];
      if (value !== undefined && value.trim() !== '') {
        return value;
      }
    }
    return null;
  }
}

/**
 * One-off lookup against a single row's own headers.
 */
export function resolveColumn(row: RawRow, field: CanonicalField): string | null {
  return new ColumnResolver(Object.keys(row)).resolve(row, field);
}
