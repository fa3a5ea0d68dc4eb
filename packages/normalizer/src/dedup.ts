import type { JobRecord } from '@jobrows/row-sdk';
import type { DedupOutcome } from './types.js';

/**
 * URLs differing only in case or surrounding whitespace are one listing.
 */
export function dedupKey(url: string): string {
  return url.trim().toLowerCase();
}

/**
 * Suppresses records whose `job_url` was already emitted in this run.
 *
 * - No URL → emit (never deduplicated against other URL-less rows)
 * - URL not seen → emit, remember it (first occurrence wins)
 * - URL seen → skip
 *
 * One instance per run; the seen set is never shared between runs.
 */
export class Deduplicator {
  private readonly seen = new Map<string, number>();
  private position = 0;

  check(record: JobRecord): DedupOutcome {
    const index = this.position++;

    if (record.job_url === null) {
      return { action: 'emit', record, index };
    }

    const key = dedupKey(record.job_url);
    const firstIndex = this.seen.get(key);
    if (firstIndex !== undefined) {
      return { action: 'skip', record, index, reason: `duplicate job_url of row ${firstIndex}` };
    }

    this.seen.set(key, index);
    return { action: 'emit', record, index };
  }

  get size(): number {
    return this.seen.size;
  }
}

/**
 * Classify a batch of records with a fresh seen set.
 */
export function dedup(records: readonly JobRecord[]): DedupOutcome[] {
  const deduplicator = new Deduplicator();
  return records.map((record) => deduplicator.check(record));
}
