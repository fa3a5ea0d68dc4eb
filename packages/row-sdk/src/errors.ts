export type RowSourceErrorCode = 'INPUT_NOT_FOUND' | 'INPUT_UNREADABLE' | 'MALFORMED_INPUT';

/**
 * Thrown by a row source when the whole input cannot be read.
 * Per-row problems never surface as errors.
 */
export class RowSourceError extends Error {
  readonly code: RowSourceErrorCode;
  readonly location: string;

  constructor(code: RowSourceErrorCode, location: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RowSourceError';
    this.code = code;
    this.location = location;
  }
}
