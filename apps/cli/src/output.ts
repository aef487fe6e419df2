import type { Command } from 'commander';
import type { SearchLogger } from '@csvcatalog/core';
import { formatTable } from './util/table.js';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

interface OutputFlags {
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
}

/** Flags may sit on the program or on the subcommand; both are merged */
export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals<OutputFlags>();
  return {
    json: opts.json === true,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    debug: opts.debug === true,
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet && !output.json) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

/** Progress and timing lines; stderr so stdout stays parseable */
export function printVerbose(message: string, output: OutputOptions): void {
  if (output.verbose && !output.quiet) {
    console.error(`[verbose] ${message}`);
  }
}

export function printWarnings(messages: string[], output: OutputOptions): void {
  for (const message of messages) {
    printWarning(message, output);
  }
}

/** Routes search engine debug lines to --verbose output */
export function searchLogger(output: OutputOptions): SearchLogger {
  return { debug: (message) => printVerbose(message, output) };
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function printHumanTable(columns: string[], rows: Record<string, unknown>[], output: OutputOptions): void {
  if (output.quiet || output.json) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const isCliError = error instanceof CliError;
  const message = isCliError ? error.message : error instanceof Error ? error.message : String(error);

  if (output.json) {
    const payload: Record<string, unknown> = {
      ok: false,
      code: isCliError ? error.code : 'INTERNAL_ERROR',
      message,
    };
    if (output.debug) {
      payload.details = isCliError
        ? error.details ?? null
        : error instanceof Error
          ? { stack: error.stack }
          : { raw: String(error) };
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (isCliError && error.details !== undefined) {
      console.error('Details:', JSON.stringify(error.details, null, 2));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  return command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show progress and timings on stderr', false)
    .option('--debug', 'Show internal error details and stacks', false);
}
