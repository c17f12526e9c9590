/**
 * CLI module, a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerExampleCommand,
  registerRunCommand,
  registerReplayCommand,
  registerRecordingsCommand,
} from './run.js';
export { registerPickCommand } from './pick.js';
export { loadSettings, parsePositiveInt, parseSeconds, EXIT } from './shared.js';
export { exampleScript } from './example.js';
