import { InvalidArgumentError as CommanderArgumentError } from 'commander';
import type { Command } from 'commander';

import { browserKindSchema } from '../schema/index.js';
import { loadEnvConfig } from '../config/env.js';
import { loadOptionalConfigFile, resolveConfig } from '../config/loader.js';
import type { CliOverrides, ResolvedConfig } from '../config/loader.js';
import { describeError } from '../core/errors.js';

// ── Option parsers ───────────────────────────────────────────

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new CommanderArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new CommanderArgumentError('Expected a non-negative number of seconds.');
  }
  return parsed;
}

export const BROWSER_CHOICES = browserKindSchema.options;

// ── Settings ─────────────────────────────────────────────────

export interface CommonOptions {
  browsers?: number;
  browser?: string;
  headless?: true;
  record?: boolean;
  recordingDir?: string;
  interval?: number;
}

/**
 * Merge flags, the config file named by the global `--config`, and the
 * environment. `--no-record` only counts when given on the command line.
 */
export async function loadSettings(
  opts: CommonOptions,
  command: Command,
): Promise<ResolvedConfig> {
  const globals = command.optsWithGlobals<{ config?: string }>();
  const file = await loadOptionalConfigFile(globals.config);

  const overrides: CliOverrides = {
    browsers: opts.browsers,
    browser: browserKindSchema.optional().parse(opts.browser),
    headless: opts.headless,
    record: command.getOptionValueSource('record') === 'cli' ? opts.record : undefined,
    recordingDir: opts.recordingDir,
    clickInterval: opts.interval,
  };

  return resolveConfig(overrides, file, loadEnvConfig());
}

// ── Exit codes ───────────────────────────────────────────────

export const EXIT = {
  OK: 0,
  TASK_FAILED: 1,
  USAGE: 4,
} as const;

/** Print `err` and set the usage/config/recording exit code. */
export function fail(err: unknown): void {
  process.stderr.write(`Error: ${describeError(err)}\n`);
  process.exitCode = EXIT.USAGE;
}
