import { z } from 'zod';
import type { ZodError } from 'zod';

import { browserKindSchema } from '../schema/config.js';
import type { BrowserKind } from '../schema/config.js';
import { ConfigError } from './loader.js';

// ── Env schema ───────────────────────────────────────────────

const booleanFlag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const envSchema = z.object({
  BROWSER_FLEET_RECORDING_DIR: z.string().min(1).optional(),
  BROWSER_FLEET_BROWSER: browserKindSchema.optional(),
  BROWSER_FLEET_HEADLESS: booleanFlag.optional(),
});

export interface EnvConfig {
  recordingDir?: string | undefined;
  browser?: BrowserKind | undefined;
  headless?: boolean | undefined;
}

// ── Env loader ───────────────────────────────────────────────

/**
 * Read the BROWSER_FLEET_* variables. Empty values count as unset.
 * `.env` is loaded by the CLI entry point before this runs.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const pick = (key: string): string | undefined => {
    const value = env[key]?.trim();
    return value === undefined || value === '' ? undefined : value;
  };

  const result = envSchema.safeParse({
    BROWSER_FLEET_RECORDING_DIR: pick('BROWSER_FLEET_RECORDING_DIR'),
    BROWSER_FLEET_BROWSER: pick('BROWSER_FLEET_BROWSER')?.toLowerCase(),
    BROWSER_FLEET_HEADLESS: pick('BROWSER_FLEET_HEADLESS')?.toLowerCase(),
  });
  if (!result.success) {
    throw new ConfigError('environment', describeIssue(result.error));
  }
  const parsed = result.data;

  return {
    recordingDir: parsed.BROWSER_FLEET_RECORDING_DIR,
    browser: parsed.BROWSER_FLEET_BROWSER,
    headless: parsed.BROWSER_FLEET_HEADLESS,
  };
}

function describeIssue(err: ZodError): string {
  const issue = err.issues[0];
  if (!issue) return 'invalid value';
  return `${issue.path.join('.')}: ${issue.message}`;
}
