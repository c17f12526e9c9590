import { actionKindSchema, selectorStrategySchema } from '../schema/index.js';
import type { BrowserKind, JsonObject, Recording, TaskSnapshot } from '../schema/index.js';
import { LIMITS, RECORDING, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { clickTask, fillTask, navigateTask, scrollTask } from './actions.js';
import type { ElementOptions } from './actions.js';
import type { Orchestrator, RunReport } from './orchestrator.js';
import { InvalidArgumentError } from './errors.js';
import { emptyReport } from './scheduler.js';
import type { Task } from './task.js';

// ── Public types ─────────────────────────────────────────────

export type ReconstructOutcome =
  | { kind: 'task'; task: Task }
  | { kind: 'skip'; reason: string };

export interface SkippedSnapshot {
  sessionIndex: number;
  taskName: string;
  reason: string;
}

export interface ReplayPlanEntry {
  sessionIndex: number;
  task: Task;
}

export interface ReplayPlan {
  entries: ReplayPlanEntry[];
  skipped: SkippedSnapshot[];
}

export interface ReplayOptions {
  kind?: BrowserKind | undefined;
  headless?: boolean | undefined;
}

export interface ReplayResult {
  sessionsCreated: number;
  submitted: number;
  skipped: SkippedSnapshot[];
  /** Session records with no live session to replay into. */
  skippedSessions: number[];
  report: RunReport;
}

// ── Reconstruction ───────────────────────────────────────────

type Rebuild = (snapshot: TaskSnapshot, meta: { name: string; description: string }) => Task | string;

const REBUILDERS: Partial<Record<string, Rebuild>> = {
  navigate(snapshot, meta) {
    const url = snapshot.args[0];
    if (typeof url !== 'string') return 'navigate needs a URL as its first argument';
    return navigateTask(url, meta);
  },

  click(snapshot, meta) {
    const selector = snapshot.args[0];
    if (typeof selector !== 'string') return 'click needs a selector as its first argument';
    return clickTask(selector, { ...meta, ...elementOptions(snapshot.kwargs) });
  },

  fill(snapshot, meta) {
    const selector = snapshot.args[0];
    if (typeof selector !== 'string') return 'fill needs a selector as its first argument';
    const text = snapshot.args[1] ?? '';
    if (typeof text !== 'string') return 'fill needs text as its second argument';
    return fillTask(selector, text, { ...meta, ...elementOptions(snapshot.kwargs) });
  },

  scroll(snapshot, meta) {
    const amount = snapshot.args[0] ?? LIMITS.DEFAULT_SCROLL_AMOUNT;
    if (typeof amount !== 'number') return 'scroll amount must be a number';
    return scrollTask(amount, meta);
  },
};

function elementOptions(kwargs: JsonObject): ElementOptions {
  const timeout = kwargs['timeout'];
  const by = selectorStrategySchema.safeParse(kwargs['by']);
  const options: ElementOptions = {
    timeout: typeof timeout === 'number' && timeout > 0 ? timeout : TIMEOUTS.ACTION_TIMEOUT_S,
  };
  if (by.success) options.by = by.data;
  return options;
}

/**
 * Rebuild an executable task from a recorded snapshot. Kinds whose
 * behavior was never captured (custom, wait, anything unknown) are
 * skipped rather than rejected.
 */
export function reconstructTask(snapshot: TaskSnapshot): ReconstructOutcome {
  const kind = actionKindSchema.safeParse(snapshot.action_kind);
  const rebuild = kind.success ? REBUILDERS[kind.data] : undefined;

  if (!rebuild) {
    return {
      kind: 'skip',
      reason: kind.success
        ? `action kind "${snapshot.action_kind}" is not replayable`
        : `unknown action kind "${snapshot.action_kind}"`,
    };
  }

  const built = rebuild(snapshot, {
    name: `replay_${snapshot.name}`,
    description: `Replay: ${snapshot.description}`,
  });
  if (typeof built === 'string') {
    return { kind: 'skip', reason: `malformed ${snapshot.action_kind} task: ${built}` };
  }
  return { kind: 'task', task: built };
}

/** Reconstruct every snapshot of `recording`, in recorded order. */
export function planReplay(recording: Recording): ReplayPlan {
  const plan: ReplayPlan = { entries: [], skipped: [] };

  for (const record of recording.sessions) {
    for (const snapshot of record.tasks) {
      const outcome = reconstructTask(snapshot);
      if (outcome.kind === 'task') {
        plan.entries.push({ sessionIndex: record.session_index, task: outcome.task });
      } else {
        plan.skipped.push({
          sessionIndex: record.session_index,
          taskName: snapshot.name,
          reason: outcome.reason,
        });
      }
    }
  }

  return plan;
}

// ── Replay ───────────────────────────────────────────────────

/**
 * Re-run `recording` on fresh sessions created by `orchestrator`, which
 * must not hold any session yet so indices line up with the recording.
 */
export async function replayRecording(
  recording: Recording,
  orchestrator: Orchestrator,
  options: ReplayOptions = {},
): Promise<ReplayResult> {
  if (orchestrator.sessionCount > 0) {
    throw new InvalidArgumentError('Replay needs an orchestrator without open sessions');
  }

  const plan = planReplay(recording);
  for (const skip of plan.skipped) {
    log.warn(`Skipping "${skip.taskName}" (session ${String(skip.sessionIndex)}): ${skip.reason}`);
  }

  const result: ReplayResult = {
    sessionsCreated: 0,
    submitted: 0,
    skipped: plan.skipped,
    skippedSessions: [],
    report: emptyReport(),
  };

  if (recording.session_count === 0) {
    log.warn(`Recording ${recording.run_id} has no sessions`);
    return result;
  }

  const locations = Array.from({ length: recording.session_count }, (_, index) => {
    const record = recording.sessions.find((s) => s.session_index === index);
    return record?.initial_location ?? RECORDING.BLANK_LOCATION;
  });

  const sessions = await orchestrator.createSessions(recording.session_count, {
    kind: options.kind,
    headless: options.headless,
    initialLocations: locations,
  });
  result.sessionsCreated = sessions.length;
  log.info(`Created ${String(sessions.length)} session(s) for replay`);

  for (const record of recording.sessions) {
    if (!orchestrator.hasSession(record.session_index)) {
      log.warn(`Session index ${String(record.session_index)} out of range, skipping its tasks`);
      result.skippedSessions.push(record.session_index);
    }
  }

  for (const entry of plan.entries) {
    if (!orchestrator.hasSession(entry.sessionIndex)) continue;
    log.detail(`Replaying task: ${entry.task.description}`);
    orchestrator.addTask(entry.task, entry.sessionIndex);
    result.submitted++;
  }

  if (result.submitted === 0) {
    log.warn('No tasks to replay');
    return result;
  }

  result.report = await orchestrator.executeAll();
  return result;
}
