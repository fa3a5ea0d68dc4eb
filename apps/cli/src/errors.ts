/**
 * Invalid command-line arguments or settings. Nothing has been read yet.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * The normalized records could not be written.
 */
export class OutputWriteError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OutputWriteError';
    this.path = path;
  }
}
