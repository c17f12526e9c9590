#!/usr/bin/env node

/**
 * browser-fleet CLI entry point.
 * Thin wrapper; all logic is delegated to core.
 */

import 'dotenv/config';
import { Command, CommanderError } from 'commander';

import { CONFIG_FILE } from '../config/defaults.js';
import { registerPickCommand } from './pick.js';
import {
  registerExampleCommand,
  registerRecordingsCommand,
  registerReplayCommand,
  registerRunCommand,
} from './run.js';
import { EXIT } from './shared.js';

const program = new Command();

program
  .name('browser-fleet')
  .description(
    'Run scripted browser actions across parallel sessions, record and replay them, and click picked positions on a timer.',
  )
  .version('0.1.0')
  .option('--config <path>', 'Path to config file', CONFIG_FILE)
  .exitOverride();

registerExampleCommand(program);
registerRunCommand(program);
registerReplayCommand(program);
registerRecordingsCommand(program);
registerPickCommand(program);

try {
  await program.parseAsync();
} catch (err) {
  if (!(err instanceof CommanderError)) throw err;
  // Help and version exit with 0; every parse error is a usage error.
  process.exitCode = err.exitCode === 0 ? EXIT.OK : EXIT.USAGE;
}
