/**
 * High-level search orchestration.
 * Parse targets, snapshot the schema, resolve units, run one query per unit
 * and aggregate the matches.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { SearchSource } from '../db/types.js';
import { QueryExecutionError } from './errors.js';
import { parseTargets } from './parse.js';
import { executeUnit } from './query.js';
import { aggregateResults } from './report.js';
import { resolveTargets } from './resolve.js';
import { captureSchema } from './schema.js';
import type { Match, SchemaInfo, SearchLogger, SearchReport, SearchUnit, UnitOutcome } from './types.js';

// Matches pulled between event-loop turns, so SIGINT handlers get to run
const YIELD_EVERY = 256;

export interface SearchInput {
  source: SearchSource;
  value: string;
  targets: readonly string[];
  maxRowsPerTable?: number;
  signal?: AbortSignal;
  logger?: SearchLogger;
}

/**
 * Parse and resolution errors are thrown before any query runs.
 * Execution errors are recorded per unit and the remaining units still run.
 * Aborting the signal stops after the current row; matches so far are kept.
 */
export async function searchCatalog(input: SearchInput): Promise<SearchReport> {
  const start = performance.now();
  const specs = parseTargets(input.targets);
  const schema = captureSchema(input.source);
  const { units, warnings } = resolveTargets(specs, schema);
  input.logger?.debug(
    `Resolved ${units.length} unit(s): ${units.map((u) => `${u.table}(${u.columns.join(', ')})`).join('; ') || 'none'}`,
  );

  const outcomes: UnitOutcome[] = [];
  let cancelled = false;
  for (const unit of units) {
    if (input.signal?.aborted) {
      cancelled = true;
      break;
    }
    const outcome = await runUnit(input, unit, schema);
    outcomes.push(outcome.result);
    if (outcome.aborted) {
      cancelled = true;
      break;
    }
    await yieldToEventLoop();
  }

  return aggregateResults(input.value, outcomes, {
    warnings,
    cancelled,
    durationMs: Math.round(performance.now() - start),
  });
}

async function runUnit(
  input: SearchInput,
  unit: SearchUnit,
  schema: SchemaInfo,
): Promise<{ result: UnitOutcome; aborted: boolean }> {
  const unitStart = performance.now();
  const matches: Match[] = [];
  try {
    const iterator = executeUnit(input.source, unit, schema, input.value, {
      maxRows: input.maxRowsPerTable,
      signal: input.signal,
    });
    let step = iterator.next();
    while (!step.done) {
      matches.push(step.value);
      if (matches.length % YIELD_EVERY === 0) {
        await yieldToEventLoop();
      }
      step = iterator.next();
    }
    const summary = step.value;
    input.logger?.debug(
      `${unit.table}: ${summary.matchedRows} row(s) in ${Math.round(performance.now() - unitStart)}ms` +
        (summary.truncated ? ' (truncated)' : ''),
    );
    return { result: { unit, matches, truncated: summary.truncated }, aborted: summary.aborted };
  } catch (err: unknown) {
    if (!(err instanceof QueryExecutionError)) throw err;
    input.logger?.debug(err.message);
    return {
      result: {
        unit,
        matches,
        truncated: false,
        error: { table: unit.table, columns: unit.columns, code: 'QUERY_EXECUTION_FAILED', message: err.message },
      },
      aborted: false,
    };
  }
}

export { parseTargets, parseTarget } from './parse.js';
export { resolveTargets } from './resolve.js';
export type { ResolveResult } from './resolve.js';
export { captureSchema } from './schema.js';
export { buildUnitQuery, executeUnit } from './query.js';
export type { UnitQuery, UnitSummary, ExecuteUnitOptions } from './query.js';
export { aggregateResults } from './report.js';
export type { ReportMeta } from './report.js';
