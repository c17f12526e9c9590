/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, LAYOUT, RECORDING, CONFIG_FILE } from './defaults.js';
export {
  ConfigError,
  loadConfigFile,
  loadOptionalConfigFile,
  loadRunScript,
  resolveConfig,
} from './loader.js';
export type { CliOverrides, ResolvedConfig } from './loader.js';
export { loadEnvConfig } from './env.js';
export type { EnvConfig } from './env.js';
