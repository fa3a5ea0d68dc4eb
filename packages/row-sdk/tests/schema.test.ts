import { describe, it, expect, vi } from 'vitest';
import { jobRecordSchema, salaryInfoSchema, validateRawRows } from '../src/schema.js';

const emptySalary = {
  display: null,
  min_amount: null,
  max_amount: null,
  currency_code: null,
  currency_symbol: null,
  period: null,
};

describe('validateRawRows', () => {
  it('keeps rows whose values are all strings', () => {
    const rows = validateRawRows([{ Title: 'Engineer', Location: '' }]);
    expect(rows).toEqual([{ Title: 'Engineer', Location: '' }]);
  });

  it('drops rows with non-string values and reports them', () => {
    const onInvalid = vi.fn();
    const rows = validateRawRows([{ Title: 'A' }, { Title: 42 }, 'nope'], { onInvalid });

    expect(rows).toEqual([{ Title: 'A' }]);
    expect(onInvalid).toHaveBeenCalledTimes(2);
    expect(onInvalid.mock.calls[0]?.[2]).toBe(1);
    expect(onInvalid.mock.calls[1]?.[2]).toBe(2);
  });
});

describe('salaryInfoSchema', () => {
  it('accepts an all-null salary', () => {
    expect(salaryInfoSchema.safeParse(emptySalary).success).toBe(true);
  });

  it('rejects a reversed range', () => {
    const result = salaryInfoSchema.safeParse({ ...emptySalary, min_amount: 700, max_amount: 500 });
    expect(result.success).toBe(false);
  });

  it('rejects unknown currency codes and periods', () => {
    expect(salaryInfoSchema.safeParse({ ...emptySalary, currency_code: 'JPY' }).success).toBe(false);
    expect(salaryInfoSchema.safeParse({ ...emptySalary, period: 'day' }).success).toBe(false);
  });
});

describe('jobRecordSchema', () => {
  it('accepts a record with absent fields as null', () => {
    const result = jobRecordSchema.safeParse({
      job_title: null,
      job_url: null,
      location: null,
      posted_date: null,
      job_description: null,
      tech_stack: [],
      salary: emptySalary,
      original_row: {},
    });
    expect(result.success).toBe(true);
  });

  it('rejects a non-ISO posted date', () => {
    const result = jobRecordSchema.safeParse({
      job_title: 'Engineer',
      job_url: 'https://example.com/jobs/1',
      location: 'Berlin',
      posted_date: '12/10/2025',
      job_description: 'Build things',
      tech_stack: ['TypeScript'],
      salary: emptySalary,
      original_row: { Title: 'Engineer' },
    });
    expect(result.success).toBe(false);
  });
});
