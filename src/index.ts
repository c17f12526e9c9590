/**
 * browser-fleet library entry point.
 */

export * from './core/index.js';
export * from './schema/index.js';
export {
  createPlaywrightLauncher,
  describeSelector,
} from './browser/index.js';
export type {
  ActionOptions,
  LaunchOptions,
  SessionHandle,
  SessionLauncher,
  WindowPosition,
} from './browser/index.js';
export {
  ConfigError,
  loadConfigFile,
  loadOptionalConfigFile,
  loadRunScript,
  loadEnvConfig,
  resolveConfig,
} from './config/index.js';
export type { CliOverrides, EnvConfig, ResolvedConfig } from './config/index.js';
