import { Option } from 'commander';
import type { Command } from 'commander';

import { createPlaywrightLauncher } from '../browser/playwright.js';
import type { SessionLauncher } from '../browser/session.js';
import type { RunScript } from '../schema/index.js';
import type { ResolvedConfig } from '../config/loader.js';
import { loadRunScript } from '../config/loader.js';
import { customTask } from '../core/actions.js';
import { Orchestrator } from '../core/orchestrator.js';
import type { RunReport } from '../core/orchestrator.js';
import {
  listRecordings,
  loadRecording,
  resolveRecordingPath,
} from '../core/recording.js';
import { replayRecording } from '../core/replay.js';
import { planScript, submitPlan } from '../core/script.js';
import {
  formatRecordingsTable,
  formatReplaySummary,
  formatRunSummary,
  generateRecordingsJSON,
  generateRunJSON,
  serializeJSON,
} from '../report/reporter.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import { exampleScript } from './example.js';
import {
  BROWSER_CHOICES,
  EXIT,
  fail,
  loadSettings,
  parsePositiveInt,
  parseSeconds,
} from './shared.js';
import type { CommonOptions } from './shared.js';

// ── Shared run flow ──────────────────────────────────────────

interface RunOptions extends CommonOptions {
  json?: true;
  autoReplay?: true;
  hold?: number;
}

const TITLE_SCRIPT = '() => document.title';

/**
 * Create one session per scripted entry, run every step and save the
 * recording. Sessions are always closed, even when the run throws.
 */
async function runScripted(
  script: RunScript,
  settings: ResolvedConfig,
  opts: RunOptions,
  launcher: SessionLauncher,
  extras?: (orchestrator: Orchestrator) => void,
): Promise<RunReport> {
  const orchestrator = new Orchestrator({
    launcher,
    recording: settings.recording,
    continueOnError: settings.continueOnError,
  });
  const plan = planScript(script);

  try {
    log.section(`Run ${orchestrator.runId}`);
    const sessions = await orchestrator.createSessions(plan.locations.length, {
      kind: settings.browser,
      headless: settings.headless,
      initialLocations: plan.locations,
    });
    log.info(`Created ${String(sessions.length)} session(s)`);

    submitPlan(plan, orchestrator);
    extras?.(orchestrator);

    const report = await orchestrator.executeAll();
    if (opts.hold !== undefined && opts.hold > 0) {
      log.info(`Holding sessions open for ${String(opts.hold)}s`);
      await sleep(opts.hold * 1000);
    }

    const exitCode = report.failed.length > 0 ? EXIT.TASK_FAILED : EXIT.OK;
    if (opts.json) {
      process.stdout.write(serializeJSON(generateRunJSON(orchestrator.runId, report, exitCode)) + '\n');
    }
    process.stderr.write(`\n${formatRunSummary(orchestrator.runId, report)}\n\n`);
    process.exitCode = exitCode;
    return report;
  } finally {
    await orchestrator.closeAll();
  }
}

async function replayFile(
  filePath: string,
  settings: ResolvedConfig,
  launcher: SessionLauncher,
): Promise<void> {
  const recording = await loadRecording(filePath);
  log.section(`Replay ${recording.run_id}`);

  const orchestrator = new Orchestrator({
    launcher,
    recording: { enabled: false },
    continueOnError: settings.continueOnError,
  });
  try {
    const result = await replayRecording(recording, orchestrator, {
      kind: settings.browser,
      headless: settings.headless,
    });
    process.stderr.write(`\n${formatReplaySummary(recording.run_id, result)}\n\n`);
    if (result.report.failed.length > 0) {
      process.exitCode = EXIT.TASK_FAILED;
    }
  } finally {
    await orchestrator.closeAll();
  }
}

// ── Command registration ─────────────────────────────────────

function addSessionOptions(command: Command): Command {
  return command
    .addOption(new Option('--browser <kind>', 'Browser engine').choices(BROWSER_CHOICES))
    .option('--headless', 'Run browsers headless')
    .option('--no-record', 'Do not save a recording')
    .option('--recording-dir <dir>', 'Directory for recordings')
    .option('--hold <seconds>', 'Keep sessions open after the run', parseSeconds)
    .option('--json', 'Output the run report as JSON on stdout')
    .option('--auto-replay', 'Replay the saved recording right after the run');
}

export function registerExampleCommand(
  program: Command,
  launcher: () => SessionLauncher = createPlaywrightLauncher,
): void {
  addSessionOptions(
    program
      .command('example')
      .description('Run the built-in demo across several sessions')
      .option('--browsers <n>', 'Number of sessions', parsePositiveInt),
  ).action(async (opts: RunOptions, command: Command) => {
    try {
      const settings = await loadSettings(opts, command);
      const sessions = launcher();
      const report = await runScripted(
        exampleScript(settings.browsers),
        settings,
        opts,
        sessions,
        (orchestrator) => {
          for (const index of orchestrator.sessionIndices) {
            orchestrator.addTask(
              customTask({
                name: 'read_title',
                description: 'Read the page title',
                run: (session) => session.runScript(TITLE_SCRIPT),
              }),
              index,
            );
          }
        },
      );
      await maybeAutoReplay(report, opts, settings, sessions);
    } catch (err) {
      fail(err);
    }
  });
}

export function registerRunCommand(
  program: Command,
  launcher: () => SessionLauncher = createPlaywrightLauncher,
): void {
  addSessionOptions(
    program
      .command('run')
      .description('Run a YAML or JSON script of sessions and steps')
      .argument('<script>', 'Path to the script file'),
  ).action(async (scriptPath: string, opts: RunOptions, command: Command) => {
    try {
      const settings = await loadSettings(opts, command);
      const script = await loadRunScript(scriptPath);
      const sessions = launcher();
      const report = await runScripted(script, settings, opts, sessions);
      await maybeAutoReplay(report, opts, settings, sessions);
    } catch (err) {
      fail(err);
    }
  });
}

async function maybeAutoReplay(
  report: RunReport,
  opts: RunOptions,
  settings: ResolvedConfig,
  launcher: SessionLauncher,
): Promise<void> {
  if (!opts.autoReplay) return;
  if (report.recordingPath === undefined) {
    log.warn('Nothing to auto-replay: no recording was saved');
    return;
  }
  const runExit = process.exitCode;
  log.info('Auto-replaying the recorded session...');
  await replayFile(report.recordingPath, settings, launcher);
  if (runExit === EXIT.TASK_FAILED) process.exitCode = runExit;
}

export function registerReplayCommand(
  program: Command,
  launcher: () => SessionLauncher = createPlaywrightLauncher,
): void {
  program
    .command('replay')
    .description('Replay a recording by path, file name or run id')
    .argument('<target>', 'Recording path, file name or run id')
    .addOption(new Option('--browser <kind>', 'Browser engine').choices(BROWSER_CHOICES))
    .option('--headless', 'Run browsers headless')
    .option('--recording-dir <dir>', 'Directory to look for recordings in')
    .action(async (target: string, opts: CommonOptions, command: Command) => {
      try {
        const settings = await loadSettings(opts, command);
        const filePath = await resolveRecordingPath(target, settings.recording.dir);
        await replayFile(filePath, settings, launcher());
      } catch (err) {
        fail(err);
      }
    });
}

export function registerRecordingsCommand(program: Command): void {
  program
    .command('recordings')
    .description('List saved recordings, newest first')
    .option('--recording-dir <dir>', 'Directory to list')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: CommonOptions & { json?: true }, command: Command) => {
      try {
        const settings = await loadSettings(opts, command);
        const entries = await listRecordings(settings.recording.dir);
        if (opts.json) {
          process.stdout.write(serializeJSON(generateRecordingsJSON(entries)) + '\n');
          return;
        }
        process.stdout.write(formatRecordingsTable(entries) + '\n');
        if (entries.length > 0) {
          process.stdout.write('\nReplay one with: browser-fleet replay <run id>\n');
        }
      } catch (err) {
        fail(err);
      }
    });
}
