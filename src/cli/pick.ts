import { Option } from 'commander';
import type { Command } from 'commander';

import { createPlaywrightLauncher } from '../browser/playwright.js';
import type { SessionLauncher } from '../browser/session.js';
import type { ClickTarget } from '../core/clicker.js';
import { Orchestrator } from '../core/orchestrator.js';
import { describeError } from '../core/errors.js';
import { RECORDING } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { BROWSER_CHOICES, EXIT, fail, loadSettings, parsePositiveInt } from './shared.js';
import type { CommonOptions } from './shared.js';

interface PickOptions extends CommonOptions {
  url?: string;
}

/**
 * Ask for one position per session, then click every picked position
 * on a timer until interrupted or the error budget runs out.
 */
async function pickAndClick(opts: PickOptions, command: Command, launcher: SessionLauncher): Promise<void> {
  const settings = await loadSettings(opts, command);
  const location = opts.url ?? RECORDING.BLANK_LOCATION;
  const orchestrator = new Orchestrator({ launcher, recording: { enabled: false } });

  let closing: Promise<void> | undefined;
  const onInterrupt = (): void => {
    log.warn('Interrupted, closing sessions');
    closing ??= orchestrator.closeAll();
  };
  process.once('SIGINT', onInterrupt);

  try {
    await orchestrator.createSessions(settings.browsers, {
      kind: settings.browser,
      headless: settings.headless,
      initialLocations: Array.from({ length: settings.browsers }, () => location),
    });

    const targets: ClickTarget[] = [];
    for (const index of orchestrator.sessionIndices) {
      if (closing) break;
      log.section(`Pick a position in session ${String(index)}`);
      const { outcome, picked } = await orchestrator.selectCoordinate(index);
      if (picked) {
        targets.push(picked);
      } else if (outcome.status === 'failed') {
        log.warn(`Session ${String(index)}: ${describeError(outcome.error)}`);
      }
    }

    if (closing) return;
    if (targets.length === 0) {
      log.warn('No positions picked, nothing to click');
      return;
    }

    log.section(`Clicking ${String(targets.length)} position(s) every ${String(settings.clickInterval)}ms (Ctrl+C to stop)`);
    const loop = orchestrator.startClicking(targets, settings.clickInterval);
    const status = await loop.done;

    const attempts = [...status.attempts.values()].reduce((sum, n) => sum + n, 0);
    log.info(
      `Click loop ${status.reason} after ${String(status.ticks)} tick(s), ` +
        `${String(attempts)} click(s), ${String(status.errors)} error(s)`,
    );
    if (status.reason === 'exhausted') {
      process.exitCode = EXIT.TASK_FAILED;
    }
  } finally {
    process.off('SIGINT', onInterrupt);
    await (closing ?? orchestrator.closeAll());
  }
}

export function registerPickCommand(
  program: Command,
  launcher: () => SessionLauncher = createPlaywrightLauncher,
): void {
  program
    .command('pick')
    .description('Pick a position in each session, then click them all on a timer')
    .option('--browsers <n>', 'Number of sessions', parsePositiveInt)
    .addOption(new Option('--browser <kind>', 'Browser engine').choices(BROWSER_CHOICES))
    .option('--url <url>', 'Page to open in every session')
    .option('--interval <ms>', 'Milliseconds between click rounds', parsePositiveInt)
    .action(async (opts: PickOptions, command: Command) => {
      try {
        await pickAndClick(opts, command, launcher());
      } catch (err) {
        fail(err);
      }
    });
}
