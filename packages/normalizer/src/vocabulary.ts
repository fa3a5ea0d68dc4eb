import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DEFAULT_VOCABULARY_URL = new URL('../data/tech-vocabulary.json', import.meta.url);

const vocabularySchema = z.array(z.string().trim().min(1)).min(1);

let defaultVocabulary: readonly string[] | null = null;

/**
 * Read and validate a vocabulary file: a JSON array of technology terms.
 * Throws when the file is missing or is not a non-empty string array.
 */
export function loadVocabulary(path: string | URL): readonly string[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return Object.freeze(vocabularySchema.parse(parsed));
}

/**
 * The bundled vocabulary, read once per process.
 */
export function getDefaultVocabulary(): readonly string[] {
  defaultVocabulary ??= loadVocabulary(DEFAULT_VOCABULARY_URL);
  return defaultVocabulary;
}
