import type { RowSource } from './types.js';

/**
 * Typed helper for row source definitions.
 * Keeps source declarations consistent without runtime overhead.
 */
export function defineRowSource<T extends RowSource>(source: T): T {
  return source;
}
