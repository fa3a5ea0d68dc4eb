import { readFile } from 'node:fs/promises';
import { CsvError } from 'csv-parse';
import { parse as parseCsvRecords } from 'csv-parse/sync';
import { z } from 'zod';
import { defineRowSource, RowSourceError, validateRawRows, type RawRow, type ReadResult, type RowSource } from '@jobrows/row-sdk';

const csvRecordsSchema = z.array(z.array(z.string()));

export interface CsvSourceOptions {
  /** Field delimiter, `,` by default. */
  delimiter?: string;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toRow(headers: readonly string[], cells: readonly string[]): Record<string, string> {
  const row: Record<string, string> = {};
  headers.forEach((header, index) => {
    // Duplicate headers: the first column keeps the name.
    if (Object.hasOwn(row, header)) return;
    row[header] = cells[index] ?? '';
  });
  return row;
}

/**
 * Tokenize CSV text into header labels and raw rows. Missing trailing cells
 * read as empty strings; cells beyond the header row are dropped.
 * Throws RowSourceError(MALFORMED_INPUT) when the text is not valid CSV.
 */
export function parseCsv(text: string, options: CsvSourceOptions = {}, location = '<inline>'): ReadResult {
  let records: string[][];
  try {
    records = csvRecordsSchema.parse(
      parseCsvRecords(text, {
        bom: true,
        delimiter: options.delimiter ?? ',',
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );
  } catch (error) {
    if (error instanceof CsvError) {
      throw new RowSourceError('MALFORMED_INPUT', location, `Malformed CSV in ${location}: ${error.message}`, { cause: error });
    }
    throw error;
  }

  const [headers = [], ...body] = records;
  let invalidCount = 0;
  const rows: RawRow[] = validateRawRows(
    body.map((cells) => toRow(headers, cells)),
    { onInvalid: () => invalidCount++ },
  );

  return { headers, rows, invalidCount };
}

/**
 * Read a UTF-8 CSV file. Missing or unreadable files raise RowSourceError.
 */
export async function readCsvFile(path: string, options: CsvSourceOptions = {}): Promise<ReadResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new RowSourceError('INPUT_NOT_FOUND', path, `Input file not found: ${path}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new RowSourceError('INPUT_UNREADABLE', path, `Cannot read input file ${path}: ${message}`, { cause: error });
  }

  return parseCsv(text, options, path);
}

export function createCsvSource(path: string, options: CsvSourceOptions = {}): RowSource {
  return defineRowSource({
    manifest: {
      id: 'csv',
      name: 'CSV file',
      location: path,
    },
    read: () => readCsvFile(path, options),
  });
}
