export type SearchErrorCode =
  | 'MALFORMED_TARGET'
  | 'UNKNOWN_TABLE'
  | 'UNKNOWN_COLUMN'
  | 'QUERY_EXECUTION_FAILED';

export class SearchError extends Error {
  readonly code: SearchErrorCode;

  constructor(code: SearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchError';
    this.code = code;
  }
}

export class MalformedTargetError extends SearchError {
  readonly target: string;

  constructor(target: string, reason: string) {
    super('MALFORMED_TARGET', `Malformed target "${target}": ${reason}`);
    this.name = 'MalformedTargetError';
    this.target = target;
  }
}

export class UnknownTableError extends SearchError {
  readonly table: string;

  constructor(table: string) {
    super('UNKNOWN_TABLE', `Table "${table}" not found.`);
    this.name = 'UnknownTableError';
    this.table = table;
  }
}

export class UnknownColumnError extends SearchError {
  readonly table: string;
  readonly column: string;

  constructor(table: string, column: string) {
    super('UNKNOWN_COLUMN', `Column "${column}" not found in table "${table}".`);
    this.name = 'UnknownColumnError';
    this.table = table;
    this.column = column;
  }
}

export class QueryExecutionError extends SearchError {
  readonly table: string;

  constructor(table: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('QUERY_EXECUTION_FAILED', `Search in table "${table}" failed: ${detail}`, { cause });
    this.name = 'QueryExecutionError';
    this.table = table;
  }
}
