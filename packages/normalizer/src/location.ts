const PLACEHOLDER_LOCATIONS: readonly RegExp[] = [
  /^see\s+job\s+desc(?:\.|ription\.?)?$/i,
  /^n\/?a$/i,
];

export function isPlaceholderLocation(value: string): boolean {
  const trimmed = value.trim();
  return trimmed === '' || PLACEHOLDER_LOCATIONS.some((pattern) => pattern.test(trimmed));
}

/**
 * Trim a location and drop "no data" placeholders. Real place names keep their casing.
 */
export function normalizeLocation(raw: string | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;
  return isPlaceholderLocation(raw) ? null : raw.trim();
}
