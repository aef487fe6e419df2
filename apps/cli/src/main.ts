#!/usr/bin/env tsx

/**
 * csvcatalog CLI entrypoint.
 */

import { Command } from 'commander';
import {
  SqliteCatalog,
  SAFE_DEFAULTS,
  classifyStatement,
  configDir,
  confirmationReason,
  loadSettings,
  parseSql,
  resolveDbPath,
  saveSettings,
  searchCatalog,
  settingsPath,
  type Settings,
} from '@csvcatalog/core';
import {
  EXIT_CODE_INTERRUPTED,
  EXIT_CODE_SUCCESS,
  fromCoreError,
  toExitCode,
  usageError,
} from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printVerbose,
  printWarning,
  printWarnings,
  searchLogger,
  withOutputFlags,
  type OutputOptions,
} from './output.js';
import {
  TABLE_LISTING_COLUMNS,
  describeProblems,
  filterByDescription,
  renderSearchReport,
  tableListingRows,
} from './render.js';
import { confirmAction } from './util/confirm.js';

const VERSION = '0.3.0';

// ── Helpers ──────────────────────────────────────────────────────────

function openCatalog(command: Command, output: OutputOptions): { catalog: SqliteCatalog; settings: Settings } {
  const settings = loadSettings();
  const { db } = command.optsWithGlobals<{ db?: string }>();
  const dbPath = resolveDbPath({ flag: db, settings });
  printVerbose(`Using catalog ${dbPath}`, output);
  return { catalog: new SqliteCatalog(dbPath), settings };
}

function parsePositiveInt(raw: string, flag: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw usageError(`Invalid ${flag}. Expected a positive integer.`);
  }
  return n;
}

async function runCommand(
  command: Command,
  fn: (output: OutputOptions) => Promise<void> | void,
): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    const mapped = fromCoreError(error);
    printError(mapped, output);
    process.exitCode = toExitCode(mapped);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('csvcatalog')
  .description('Search and manage CSV tables imported into a local SQLite catalog')
  .option('--db <path>', 'Catalog database file (overrides settings and CSVCATALOG_DB)')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show progress and timings on stderr', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Search:   search
  Catalog:  tables, describe, delete, purge, sql
  Config:   settings
`,
);

// ── search ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('search <value> [targets...]')
      .description('Search for a value in all tables, some tables, or specific columns')
      .option('--limit <n>', 'Maximum matching rows collected per table')
      .action(async function (this: Command, value: string, targets: string[]) {
        await runCommand(this, async (output) => {
          if (value.length === 0) {
            throw usageError('Search value must not be empty.');
          }
          const opts = this.opts<{ limit?: string }>();
          const limitFlag = opts.limit === undefined ? undefined : parsePositiveInt(opts.limit, '--limit');

          const { catalog, settings } = openCatalog(this, output);
          const controller = new AbortController();
          const onSigint = (): void => controller.abort();
          process.once('SIGINT', onSigint);
          try {
            printHuman(`Searching for "${value}"...`, output);
            const report = await searchCatalog({
              source: catalog,
              value,
              targets,
              maxRowsPerTable: limitFlag ?? settings.maxRowsPerTable ?? SAFE_DEFAULTS.maxRowsPerTable,
              signal: controller.signal,
              logger: searchLogger(output),
            });

            if (output.json) {
              printCommandSuccess(report, output);
            } else {
              printHuman(renderSearchReport(report), output);
              printWarnings(describeProblems(report), output);
            }
            if (report.cancelled) {
              process.exitCode = EXIT_CODE_INTERRUPTED;
            }
          } finally {
            process.removeListener('SIGINT', onSigint);
            catalog.close();
          }
        });
      }),
  ),
  [
    'csvcatalog search jane',
    'csvcatalog search jane users',
    'csvcatalog search 42 orders.user_id users.id',
    'csvcatalog search active "*.status" --json',
  ],
);

// ── tables ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('tables [filter]')
      .description('List tables; optionally filter by description (case-insensitive)')
      .action(async function (this: Command, filter: string | undefined) {
        await runCommand(this, async (output) => {
          const { catalog } = openCatalog(this, output);
          try {
            const tables = filterByDescription(catalog.getTables(), filter);
            if (output.json) {
              printCommandSuccess(tables, output);
              return;
            }
            if (tables.length === 0) {
              printHuman(filter ? `No tables match "${filter}".` : 'No tables found.', output);
              return;
            }
            printHumanTable(TABLE_LISTING_COLUMNS, tableListingRows(tables), output);
          } finally {
            catalog.close();
          }
        });
      }),
  ),
  ['csvcatalog tables', 'csvcatalog tables invoices --json'],
);

// ── describe ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('describe <table> <description>')
      .description('Add or update the description of a table')
      .action(async function (this: Command, table: string, description: string) {
        await runCommand(this, async (output) => {
          const { catalog } = openCatalog(this, output);
          try {
            catalog.updateDescription(table, description);
            printCommandSuccess({ table, description }, output, `Description for table "${table}" updated.`);
          } finally {
            catalog.close();
          }
        });
      }),
  ),
  ['csvcatalog describe users "Customer accounts exported 2024-05"'],
);

// ── delete ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('delete <table>')
      .description('Delete a table from the catalog')
      .option('--yes', 'Skip confirmation', false)
      .action(async function (this: Command, table: string) {
        await runCommand(this, async (output) => {
          const { yes } = this.opts<{ yes: boolean }>();
          const { catalog } = openCatalog(this, output);
          try {
            if (!catalog.hasTable(table)) {
              throw usageError(`Table "${table}" not found.`, 'TABLE_NOT_FOUND');
            }
            await confirmAction(`Delete table "${table}"?`, { yes });
            catalog.deleteTable(table);
            printCommandSuccess({ deleted: table }, output, `Table "${table}" deleted.`);
          } finally {
            catalog.close();
          }
        });
      }),
  ),
  ['csvcatalog delete users', 'csvcatalog delete users --yes'],
);

// ── purge ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('purge')
      .description('Delete every table in the catalog')
      .option('--yes', 'Skip confirmation', false)
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const { yes } = this.opts<{ yes: boolean }>();
          const { catalog } = openCatalog(this, output);
          try {
            await confirmAction('Clear the entire catalog?', { yes });
            const dropped = catalog.purge();
            printCommandSuccess({ dropped }, output, `Catalog purged (${dropped.length} table(s) dropped).`);
          } finally {
            catalog.close();
          }
        });
      }),
  ),
  ['csvcatalog purge --yes'],
);

// ── sql ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('sql <query>')
      .description('Execute one raw SQL statement against the catalog')
      .option('--yes', 'Run write statements without confirmation', false)
      .action(async function (this: Command, query: string) {
        await runCommand(this, async (output) => {
          const { yes } = this.opts<{ yes: boolean }>();
          const parsed = parseSql(query);
          if (parsed.ok && parsed.statementCount > 1) {
            throw usageError('Only one statement can be executed at a time.');
          }

          const { catalog } = openCatalog(this, output);
          try {
            const classification = classifyStatement(query);
            printVerbose(`Statement: ${classification.summary}`, output);
            const reason = confirmationReason(classification, catalog.isReader(query));
            if (reason !== null) {
              if (!output.json) printWarning(reason, output);
              await confirmAction('Execute this statement?', { yes });
            }

            const result = catalog.execute(query);
            if (output.json) {
              printCommandSuccess(result, output);
              return;
            }
            if (!result.reader) {
              printHuman(`${result.changes} row(s) affected (${result.execMs}ms).`, output);
              return;
            }
            if (result.rows.length === 0) {
              printHuman('Query returned no results.', output);
              return;
            }
            printHumanTable(result.columns, result.rows, output);
            printHuman(`${result.rows.length} row(s) (${result.execMs}ms).`, output);
          } finally {
            catalog.close();
          }
        });
      }),
  ),
  ['csvcatalog sql "SELECT name, email FROM users LIMIT 5"', 'csvcatalog sql "UPDATE users SET name = \'x\' WHERE id = 1" --yes'],
);

// ── settings ─────────────────────────────────────────────────────────

const settingsCmd = program.command('settings').description('Show or change persisted settings');

withExamples(
  withOutputFlags(
    settingsCmd
      .command('show')
      .description('Show current settings')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          const settings = loadSettings();
          const { db } = this.optsWithGlobals<{ db?: string }>();
          const payload = {
            configDir: configDir(),
            settingsFile: settingsPath(),
            dbPath: settings.dbPath ?? null,
            effectiveDbPath: resolveDbPath({ flag: db, settings }),
            maxRowsPerTable: settings.maxRowsPerTable ?? SAFE_DEFAULTS.maxRowsPerTable,
          };
          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }
          printHuman(`Settings file:      ${payload.settingsFile}`, output);
          printHuman(`db_path:            ${payload.dbPath ?? 'not set'}`, output);
          printHuman(`Effective database: ${payload.effectiveDbPath}`, output);
          printHuman(`Rows per table:     ${payload.maxRowsPerTable}`, output);
        });
      }),
  ),
  ['csvcatalog settings show', 'csvcatalog settings show --json'],
);

withExamples(
  withOutputFlags(
    settingsCmd
      .command('dbfile <path>')
      .description('Set the catalog database file')
      .action(async function (this: Command, path: string) {
        await runCommand(this, async (output) => {
          const settings = loadSettings();
          const dbPath = resolveDbPath({ flag: path, settings });
          saveSettings({ ...settings, dbPath });
          printCommandSuccess({ dbPath }, output, `Database path set to: ${dbPath}`);
        });
      }),
  ),
  ['csvcatalog settings dbfile ~/data/catalog.db'],
);

withExamples(
  withOutputFlags(
    settingsCmd
      .command('limit <rows>')
      .description('Set the maximum matching rows collected per table during search')
      .action(async function (this: Command, rows: string) {
        await runCommand(this, async (output) => {
          const maxRowsPerTable = parsePositiveInt(rows, 'row limit');
          saveSettings({ ...loadSettings(), maxRowsPerTable });
          printCommandSuccess({ maxRowsPerTable }, output, `Search row limit set to ${maxRowsPerTable} per table.`);
        });
      }),
  ),
  ['csvcatalog settings limit 1000'],
);

// ── parse ────────────────────────────────────────────────────────────

function commanderCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander reports help/version output and usage failures as CommanderError
    const code = commanderCode(error);
    if (code === 'commander.helpDisplayed' || code === 'commander.version' || code === 'commander.help') {
      process.exitCode = EXIT_CODE_SUCCESS;
      return;
    }
    if (code?.startsWith('commander.')) {
      const message = error instanceof Error ? error.message : String(error);
      printError(usageError(message), output);
      process.exitCode = 1;
      return;
    }
    const mapped = fromCoreError(error);
    printError(mapped, output);
    process.exitCode = toExitCode(mapped);
  }
}

void main();
