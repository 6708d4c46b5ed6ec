/**
 * Matching key for part codes: spaces, dashes and dots removed, upper-cased.
 * `PK-5396`, `pk5396` and `PK 5396` share the key `PK5396`.
 */
export function normalizeArtikul(value: string | null | undefined): string {
  return String(value ?? '')
    .replace(/[ .-]+/g, '')
    .toUpperCase();
}

/** SQL expression producing the same key as {@link normalizeArtikul} for a column. */
export function normalizedArtikulSql(column: string): string {
  return `REPLACE(REPLACE(REPLACE(UPPER(${column}), ' ', ''), '-', ''), '.', '')`;
}
