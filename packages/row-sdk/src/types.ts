import type { RawRow } from './schema.js';

export interface RowSourceManifest {
  id: string;
  name: string;
  /** File path, URL or other locator, for logs only. */
  location: string;
}

export interface ReadResult {
  /** Header labels in input order. */
  headers: string[];
  rows: RawRow[];
  /** Rows dropped because they did not match the RawRow shape. */
  invalidCount: number;
}

export interface RowSource {
  manifest: RowSourceManifest;
  read(): Promise<ReadResult>;
}
