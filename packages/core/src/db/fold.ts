/**
 * Case folding for substring search.
 *
 * SQLite's built-in lower() only folds ASCII, so catalog connections register
 * FOLD_FUNCTION and search predicates compare folded column text against a
 * value folded here with the same rules.
 */

export const FOLD_FUNCTION = 'catalog_fold';

export function foldCase(text: string): string {
  return text.normalize('NFC').toLowerCase();
}

/** SQL-side implementation registered under FOLD_FUNCTION */
export function foldSqlValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return foldCase(typeof value === 'string' ? value : String(value));
}
