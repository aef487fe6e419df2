/**
 * User settings persisted as JSON in the config directory.
 * Validated with AJV on both load and save.
 */

import AjvModule from 'ajv';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { settingsSchema } from './settings_schema.js';

const Ajv = AjvModule.default;

export interface Settings {
  /** Catalog database file */
  dbPath?: string;
  /** Matching rows collected per table before a search unit is truncated */
  maxRowsPerTable?: number;
}

export class SettingsError extends Error {
  readonly code = 'SETTINGS_INVALID';
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid settings file ${path}: ${message}`);
    this.name = 'SettingsError';
    this.path = path;
  }
}

const ajv = new Ajv({ allErrors: true });
const validateSettings = ajv.compile<Settings>(settingsSchema);

// ── Paths ────────────────────────────────────────────────────────────

export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.CSVCATALOG_HOME || join(homedir(), '.csvcatalog');
}

export function settingsPath(dir: string = configDir()): string {
  return join(dir, 'settings.json');
}

export function defaultDbPath(dir: string = configDir()): string {
  return join(dir, 'catalog.db');
}

/**
 * Database path precedence: explicit flag, CSVCATALOG_DB, settings, default.
 */
export function resolveDbPath(opts: {
  flag?: string;
  settings: Settings;
  env?: NodeJS.ProcessEnv;
}): string {
  const env = opts.env ?? process.env;
  const chosen = opts.flag || env.CSVCATALOG_DB || opts.settings.dbPath || defaultDbPath(configDir(env));
  return chosen === ':memory:' ? chosen : resolve(chosen);
}

// ── Load / save ──────────────────────────────────────────────────────

export function loadSettings(path: string = settingsPath()): Settings {
  if (!existsSync(path)) {
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new SettingsError(path, msg);
  }

  if (!validateSettings(data)) {
    throw new SettingsError(path, ajv.errorsText(validateSettings.errors));
  }
  return data;
}

export function saveSettings(settings: Settings, path: string = settingsPath()): void {
  if (!validateSettings(settings)) {
    throw new SettingsError(path, ajv.errorsText(validateSettings.errors));
  }
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, `${JSON.stringify(settings, null, 2)}\n`, 'utf-8');
}
