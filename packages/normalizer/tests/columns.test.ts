import { describe, it, expect } from 'vitest';
import { ColumnResolver, headerHasKeyword, normalizeHeader, resolveColumn } from '../src/columns.js';

describe('normalizeHeader', () => {
  it('lowercases and folds separators', () => {
    expect(normalizeHeader('  Job_Description-HTML ')).toBe('job description html');
  });
});

describe('headerHasKeyword', () => {
  it('matches whole words, singular or plural', () => {
    expect(headerHasKeyword('Apply Link', 'link')).toBe(true);
    expect(headerHasKeyword('Listing_URLs', 'url')).toBe(true);
    expect(headerHasKeyword('Key Skills', 'skill')).toBe(true);
  });

  it('splits camelCase headers into words', () => {
    expect(headerHasKeyword('applyUrl', 'url')).toBe(true);
  });

  it('ignores keywords inside longer words', () => {
    expect(headerHasKeyword('Company LinkedIn', 'link')).toBe(false);
    expect(headerHasKeyword('Hyperlink', 'link')).toBe(false);
    expect(headerHasKeyword('Payroll ID', 'pay')).toBe(false);
  });
});

describe('ColumnResolver', () => {
  it('returns the first non-blank value in variant priority order', () => {
    const resolver = new ColumnResolver(['Title', 'Job Title', 'URL']);
    const row = { Title: 'Developer', 'Job Title': '   ', URL: 'https://example.com/1' };

    expect(resolver.headersFor('job_title')).toEqual(['Job Title', 'Title']);
    expect(resolver.resolve(row, 'job_title')).toBe('Developer');
  });

  it('matches headers case-insensitively and tolerates whitespace and underscores', () => {
    const resolver = new ColumnResolver(['  JOB_TITLE ', 'Date   Posted']);
    expect(resolver.headersFor('job_title')).toEqual(['  JOB_TITLE ']);
    expect(resolver.headersFor('posted_date')).toEqual(['Date   Posted']);
  });

  it('prefers an HTML description column over a plain one', () => {
    const resolver = new ColumnResolver(['Description', 'Job_Description_HTML']);
    expect(resolver.headersFor('job_description')).toEqual(['Job_Description_HTML', 'Description']);
  });

  it('claims unknown headers by keyword after exact variants', () => {
    const resolver = new ColumnResolver(['Apply Link', 'Company Position Name', 'Base Compensation', 'URL']);

    expect(resolver.headersFor('job_url')).toEqual(['URL', 'Apply Link']);
    expect(resolver.headersFor('job_title')).toEqual(['Company Position Name']);
    expect(resolver.headersFor('salary')).toEqual(['Base Compensation']);
  });

  it('treats any URL-shaped header as a URL, never a title', () => {
    const resolver = new ColumnResolver(['Posting URL Title']);
    expect(resolver.headersFor('job_url')).toEqual(['Posting URL Title']);
    expect(resolver.headersFor('job_title')).toEqual([]);
  });

  it('does not read a LinkedIn column as the job URL', () => {
    const resolver = new ColumnResolver(['Job URL', 'Company LinkedIn', 'Recruiter LinkedIn', 'Job Title']);
    const row = {
      'Job URL': '',
      'Company LinkedIn': 'https://linkedin.com/company/acme',
      'Recruiter LinkedIn': 'https://linkedin.com/in/recruiter',
      'Job Title': 'Backend',
    };

    expect(resolver.headersFor('job_url')).toEqual(['Job URL']);
    expect(resolver.resolve(row, 'job_url')).toBeNull();
  });

  it('returns null when no column supplies the field', () => {
    const resolver = new ColumnResolver(['Company']);
    expect(resolver.headersFor('location')).toEqual([]);
    expect(resolver.resolve({ Company: 'Acme' }, 'location')).toBeNull();
  });

  it('returns the value as written', () => {
    const resolver = new ColumnResolver(['City']);
    expect(resolver.resolve({ City: '  Paris ' }, 'location')).toBe('  Paris ');
  });

  it('builds from the union of row keys', () => {
    const resolver = ColumnResolver.fromRows([{ Title: 'A' }, { Title: 'B', Skills: 'Go' }]);
    expect(resolver.headersFor('tech_stack')).toEqual(['Skills']);
  });
});

describe('resolveColumn', () => {
  it('resolves against the row’s own headers', () => {
    expect(resolveColumn({ City: 'Paris' }, 'location')).toBe('Paris');
    expect(resolveColumn({ City: '' }, 'location')).toBeNull();
  });
});
