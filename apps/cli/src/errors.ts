import { CatalogError, SearchError, SettingsError } from '@csvcatalog/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;
export const EXIT_CODE_INTERRUPTED = 130;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'MALFORMED_TARGET'
  | 'UNKNOWN_TABLE'
  | 'UNKNOWN_COLUMN'
  | 'TABLE_NOT_FOUND'
  | 'INVALID_IDENTIFIER'
  | 'CONFIRMATION_REQUIRED'
  | 'CONFIRMATION_DECLINED'
  | 'NOT_READ_ONLY'
  | 'SETTINGS_INVALID'
  | 'DB_QUERY_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'DB_QUERY_FAILED', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, code: CliErrorCode = 'NOT_READ_ONLY', details?: unknown): CliError {
  return new CliError('policy', code, message, details);
}

/**
 * Translate errors raised by @csvcatalog/core (and SQLite itself) into
 * CliErrors. Anything else is returned unchanged.
 */
export function fromCoreError(error: unknown): unknown {
  if (error instanceof CliError) return error;

  if (error instanceof SearchError) {
    if (error.code === 'QUERY_EXECUTION_FAILED') {
      return runtimeError(error.message, 'DB_QUERY_FAILED');
    }
    return usageError(error.message, error.code);
  }

  if (error instanceof CatalogError) {
    if (error.code === 'NOT_READ_ONLY') {
      return policyError(error.message);
    }
    return usageError(error.message, error.code);
  }

  if (error instanceof SettingsError) {
    return runtimeError(error.message, 'SETTINGS_INVALID', { path: error.path });
  }

  if (error instanceof Error && error.name === 'SqliteError') {
    return runtimeError(error.message, 'DB_QUERY_FAILED', { stack: error.stack });
  }

  return error;
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
