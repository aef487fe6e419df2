import type { ColumnAffinity } from './types.js';

/**
 * Map a declared column type to its SQLite affinity.
 * Rules are checked in the same order SQLite applies them.
 */
export function columnAffinity(declaredType: string): ColumnAffinity {
  const t = declaredType.toUpperCase();
  if (t.includes('INT')) return 'integer';
  if (t.includes('CHAR') || t.includes('CLOB') || t.includes('TEXT')) return 'text';
  if (t.includes('BLOB') || t.trim() === '') return 'blob';
  if (t.includes('REAL') || t.includes('FLOA') || t.includes('DOUB')) return 'real';
  return 'numeric';
}

/** Text and untyped columns are searched by substring; the rest by equality */
export function isTextLike(affinity: ColumnAffinity): boolean {
  return affinity === 'text' || affinity === 'blob';
}
