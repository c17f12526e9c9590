import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';

import { fileConfigSchema, runScriptSchema } from '../schema/index.js';
import type { BrowserKind, FileConfig, RunScript } from '../schema/index.js';
import { CONFIG_FILE, LIMITS, RECORDING } from './defaults.js';
import type { EnvConfig } from './env.js';

// ── Errors ───────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;
  readonly path: string;
  readonly missing: boolean;

  constructor(path: string, reason: string, missing = false) {
    super(`${path}: ${reason}`);
    this.name = 'ConfigError';
    this.path = path;
    this.missing = missing;
  }
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.browser-fleet.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  return loadDocument(configPath, fileConfigSchema, true);
}

/**
 * Like loadConfigFile, but the default config file may be absent.
 * A file the user named explicitly must exist.
 */
export async function loadOptionalConfigFile(
  configPath: string = CONFIG_FILE,
): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (err instanceof ConfigError && err.missing && configPath === CONFIG_FILE) {
      return {};
    }
    throw err;
  }
}

/** Load a YAML or JSON script describing sessions and their steps. */
export async function loadRunScript(scriptPath: string): Promise<RunScript> {
  return loadDocument(scriptPath, runScriptSchema, false);
}

// ── Merge ────────────────────────────────────────────────────

export interface CliOverrides {
  browsers?: number | undefined;
  browser?: BrowserKind | undefined;
  headless?: boolean | undefined;
  record?: boolean | undefined;
  recordingDir?: string | undefined;
  clickInterval?: number | undefined;
}

export interface ResolvedConfig {
  browsers: number;
  browser: BrowserKind;
  headless: boolean;
  continueOnError: boolean;
  clickInterval: number;
  recording: { enabled: boolean; dir: string };
}

/** CLI flags win over the config file, which wins over the environment. */
export function resolveConfig(
  cli: CliOverrides,
  file: FileConfig,
  env: EnvConfig,
): ResolvedConfig {
  return {
    browsers: cli.browsers ?? file.browsers ?? LIMITS.DEFAULT_SESSIONS,
    browser: cli.browser ?? file.browser ?? env.browser ?? 'chromium',
    headless: cli.headless ?? file.headless ?? env.headless ?? false,
    continueOnError: file.continueOnError ?? true,
    clickInterval: cli.clickInterval ?? file.clickInterval ?? LIMITS.DEFAULT_CLICK_INTERVAL,
    recording: {
      enabled: cli.record ?? file.recording?.enabled ?? true,
      dir: cli.recordingDir ?? file.recording?.dir ?? env.recordingDir ?? RECORDING.DEFAULT_DIR,
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

async function loadDocument<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  emptyAllowed: boolean,
): Promise<T> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(filePath, 'file not found', true);
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(filePath, err instanceof Error ? err.message : 'unreadable document');
  }

  // An empty YAML file parses to null.
  if ((parsed === null || parsed === undefined) && emptyAllowed) {
    parsed = {};
  }

  try {
    return schema.parse(parsed);
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
      throw new ConfigError(filePath, `${where}: ${issue?.message ?? 'invalid document'}`);
    }
    throw err;
  }
}
