/**
 * @csvcatalog/core barrel export
 *
 * Search engine, catalog storage and settings shared by the CLI.
 */

// Database types
export type { ColumnAffinity, ColumnInfo, TableInfo, QueryRow, SearchSource, SqlResult } from './db/types.js';
export { SAFE_DEFAULTS } from './db/defaults.js';
export { columnAffinity, isTextLike } from './db/affinity.js';
export { FOLD_FUNCTION, foldCase, foldSqlValue } from './db/fold.js';

// Catalog storage
export { SqliteCatalog, CatalogError, META_TABLE } from './storage/catalog.js';
export type { CatalogErrorCode, ColumnDefinition, ColumnType } from './storage/catalog.js';

// Search engine
export {
  searchCatalog,
  parseTargets,
  parseTarget,
  resolveTargets,
  captureSchema,
  buildUnitQuery,
  executeUnit,
  aggregateResults,
} from './search/index.js';
export type {
  SearchInput,
  ResolveResult,
  UnitQuery,
  UnitSummary,
  ExecuteUnitOptions,
  ReportMeta,
} from './search/index.js';
export type {
  TargetSpec,
  SchemaInfo,
  SearchUnit,
  Match,
  UnitOutcome,
  UnitError,
  ColumnReport,
  TableReport,
  SearchReport,
  SearchLogger,
} from './search/types.js';
export {
  SearchError,
  MalformedTargetError,
  UnknownTableError,
  UnknownColumnError,
  QueryExecutionError,
} from './search/errors.js';
export type { SearchErrorCode } from './search/errors.js';

// SQL statement classification
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';
export { classifyStatement, confirmationReason } from './policy/classify.js';
export type { StatementClassification, ClassificationResult } from './policy/classify.js';

// Settings
export {
  loadSettings,
  saveSettings,
  resolveDbPath,
  configDir,
  settingsPath,
  defaultDbPath,
  SettingsError,
} from './config/settings.js';
export type { Settings } from './config/settings.js';
