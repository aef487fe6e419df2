/**
 * Safe defaults for search execution.
 */

export const SAFE_DEFAULTS = {
  /** Matching rows collected per searched table before the unit is truncated */
  maxRowsPerTable: 5000,
} as const;
