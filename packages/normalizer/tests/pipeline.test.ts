import { describe, it, expect, vi } from 'vitest';
import { defineRowSource, jobRecordSchema, RowSourceError, type RawRow } from '@jobrows/row-sdk';
import { normalizeRows, runPipeline } from '../src/pipeline.js';

const referenceDate = { year: 2025, month: 12, day: 10 };

function createLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const rows: RawRow[] = [
  {
    Title: 'Backend Engineer',
    URL: 'https://example.com/jobs/1',
    Location: ' London ',
    Posted: '12/10/2025',
    Salary: '$500 - $650 per day',
    Description: '<p>Node.js &amp; PostgreSQL</p>',
  },
  {
    Title: 'Backend Engineer (repost)',
    URL: 'https://example.com/jobs/1',
    Location: 'Paris',
    Posted: 'yesterday',
    Salary: '',
    Description: '',
  },
  {
    Title: 'Data Analyst',
    URL: '',
    Location: 'n/a',
    Posted: 'last week',
    Salary: '£40k',
    Description: 'SQL and Tableau',
  },
  {
    Title: 'Designer',
    URL: '',
    Location: 'Berlin',
    Posted: '2025-11-30',
    Salary: 'DOE',
    Description: 'Figma',
  },
];

describe('normalizeRows', () => {
  it('keeps the first record for a duplicated URL', () => {
    const { records } = normalizeRows(rows, { referenceDate, logger: createLogger() });

    expect(records.map((r) => r.job_title)).toEqual(['Backend Engineer', 'Data Analyst', 'Designer']);
    expect(records[0]).toMatchObject({
      job_url: 'https://example.com/jobs/1',
      location: 'London',
      posted_date: '2025-12-10',
      job_description: 'Node.js & PostgreSQL',
      tech_stack: ['Node.js', 'PostgreSQL'],
      salary: { display: '$500 - $650', min_amount: 500, max_amount: 650, period: 'Day' },
    });
  });

  it('counts stages and degraded fields', () => {
    const { stats } = normalizeRows(rows, { referenceDate, logger: createLogger() });

    expect(stats).toEqual({
      rows: 4,
      emitted: 3,
      duplicatesSkipped: 1,
      withoutUrl: 2,
      unparsedDates: 1,
      unparsedSalaries: 1,
      placeholderLocations: 1,
    });
  });

  it('logs warnings for degraded rows', () => {
    const logger = createLogger();
    normalizeRows(rows, { referenceDate, logger });

    expect(logger.warn).toHaveBeenCalledWith('[normalize] 2 rows have no job_url and were not deduplicated');
    expect(logger.warn).toHaveBeenCalledWith('[normalize] 1 posted dates could not be parsed');
    expect(logger.info).toHaveBeenCalledWith('[normalize] 1 rows skipped (duplicate job_url)');
    expect(logger.info).toHaveBeenCalledWith('[normalize] 3 of 4 rows emitted');
  });

  it('produces identical output on repeated runs', () => {
    const first = normalizeRows(rows, { referenceDate, logger: createLogger() });
    const second = normalizeRows(rows, { referenceDate, logger: createLogger() });

    expect(JSON.stringify(second.records)).toBe(JSON.stringify(first.records));
  });

  it('emits records that satisfy the output schema', () => {
    const { records } = normalizeRows(rows, { referenceDate, logger: createLogger() });
    for (const record of records) {
      expect(jobRecordSchema.safeParse(record).success).toBe(true);
    }
  });

  it('keeps unique URLs unique across the output', () => {
    const { records } = normalizeRows(rows, { referenceDate, logger: createLogger() });
    const urls = records.flatMap((r) => (r.job_url === null ? [] : [r.job_url]));
    expect(new Set(urls).size).toBe(urls.length);
  });

  it('accepts a custom vocabulary', () => {
    const { records } = normalizeRows([{ Description: 'Elm and Haskell' }], {
      referenceDate,
      vocabulary: ['Elm'],
      logger: createLogger(),
    });
    expect(records[0]?.tech_stack).toEqual(['Elm']);
  });

  it('never merges rows whose URL cell is empty because of a profile-link column', () => {
    const listings: RawRow[] = [
      { 'Job URL': '', 'Company LinkedIn': 'https://linkedin.com/company/acme', 'Job Title': 'Backend' },
      { 'Job URL': '', 'Company LinkedIn': 'https://linkedin.com/company/acme', 'Job Title': 'Frontend' },
    ];

    const { records, stats } = normalizeRows(listings, { referenceDate, vocabulary: ['Go'], logger: createLogger() });

    expect(records.map((r) => [r.job_title, r.job_url])).toEqual([
      ['Backend', null],
      ['Frontend', null],
    ]);
    expect(stats).toMatchObject({ emitted: 2, duplicatesSkipped: 0, withoutUrl: 2 });
  });

  it('handles empty input', () => {
    const { records, stats } = normalizeRows([], { referenceDate, logger: createLogger() });
    expect(records).toEqual([]);
    expect(stats.rows).toBe(0);
  });
});

describe('runPipeline', () => {
  it('reads the source and reports invalid rows', async () => {
    const logger = createLogger();
    const source = defineRowSource({
      manifest: { id: 'memory', name: 'In-memory rows', location: 'memory://test' },
      read: async () => ({ headers: ['Title', 'URL', 'Location', 'Posted', 'Salary', 'Description'], rows, invalidCount: 2 }),
    });

    const result = await runPipeline(source, { referenceDate, logger });

    expect(result.sourceId).toBe('memory');
    expect(result.invalidRows).toBe(2);
    expect(result.records).toHaveLength(3);
    expect(logger.info).toHaveBeenCalledWith('[normalize:memory] Received 4 rows');
    expect(logger.warn).toHaveBeenCalledWith('[normalize:memory] 2 rows failed validation');
  });

  it('propagates source errors', async () => {
    const source = defineRowSource({
      manifest: { id: 'broken', name: 'Broken', location: 'missing.csv' },
      read: async () => {
        throw new RowSourceError('INPUT_NOT_FOUND', 'missing.csv', 'Input file not found: missing.csv');
      },
    });

    await expect(runPipeline(source, { referenceDate, logger: createLogger() })).rejects.toThrow(
      'Input file not found: missing.csv',
    );
  });
});
