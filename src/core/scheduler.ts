import type { SessionHandle } from '../browser/session.js';
import * as log from '../utils/logger.js';
import { SessionUnreachableError, TaskExecutionError, describeError } from './errors.js';
import type { Task } from './task.js';

// ── Public types ─────────────────────────────────────────────

export interface Submission {
  task: Task;
  sessionIndex: number;
}

export interface SchedulerOptions {
  /** Keep running a chain after one of its tasks fails. */
  continueOnError: boolean;
  /** Look up the handle for a chain; `undefined` fails the whole chain. */
  resolveSession(index: number): SessionHandle | undefined;
  /** Called as each task succeeds, before the next one in its chain starts. */
  onSuccess?(task: Task, sessionIndex: number): void;
}

export interface CompletedTask {
  sessionIndex: number;
  taskName: string;
  seconds: number | null;
}

export interface FailedTask {
  sessionIndex: number;
  taskName: string;
  error: TaskExecutionError;
}

export interface SkippedTask {
  sessionIndex: number;
  taskName: string;
}

export interface ExecutionReport {
  completed: CompletedTask[];
  failed: FailedTask[];
  skipped: SkippedTask[];
}

export function emptyReport(): ExecutionReport {
  return { completed: [], failed: [], skipped: [] };
}

// ── Partitioning ─────────────────────────────────────────────

/**
 * Group submissions into one ordered chain per session index.
 * Chains appear in first-submission order; tasks keep submission order.
 */
export function partitionChains(
  submissions: readonly Submission[],
): Map<number, Task[]> {
  const chains = new Map<number, Task[]>();
  for (const { task, sessionIndex } of submissions) {
    const chain = chains.get(sessionIndex);
    if (chain) {
      chain.push(task);
    } else {
      chains.set(sessionIndex, [task]);
    }
  }
  return chains;
}

// ── Execution ────────────────────────────────────────────────

/**
 * Run every chain concurrently, one worker per session, each worker
 * strictly sequential. Resolves once all chains have finished.
 */
export async function executeChains(
  submissions: readonly Submission[],
  options: SchedulerOptions,
): Promise<ExecutionReport> {
  const report = emptyReport();
  const chains = partitionChains(submissions);

  await Promise.all(
    [...chains].map(([sessionIndex, tasks]) =>
      runChain(sessionIndex, tasks, options, report),
    ),
  );

  return report;
}

async function runChain(
  sessionIndex: number,
  tasks: readonly Task[],
  options: SchedulerOptions,
  report: ExecutionReport,
): Promise<void> {
  const session = options.resolveSession(sessionIndex);

  if (!session) {
    const cause = new SessionUnreachableError(sessionIndex, 'no live session');
    for (const task of tasks) {
      recordFailure(report, sessionIndex, task, cause);
    }
    return;
  }

  for (const [i, task] of tasks.entries()) {
    try {
      await task.execute(session);
    } catch (err) {
      recordFailure(report, sessionIndex, task, err);

      if (!options.continueOnError) {
        for (const rest of tasks.slice(i + 1)) {
          report.skipped.push({ sessionIndex, taskName: rest.name });
        }
        log.warn(
          `Session ${String(sessionIndex)}: skipping ${String(tasks.length - i - 1)} remaining task(s)`,
        );
        return;
      }
      continue;
    }

    log.taskResult(sessionIndex, task.name, true, task.executionSeconds);
    report.completed.push({
      sessionIndex,
      taskName: task.name,
      seconds: task.executionSeconds,
    });
    options.onSuccess?.(task, sessionIndex);
  }
}

function recordFailure(
  report: ExecutionReport,
  sessionIndex: number,
  task: Task,
  cause: unknown,
): void {
  const error = new TaskExecutionError(sessionIndex, task.name, cause);
  log.taskResult(sessionIndex, task.name, false, task.executionSeconds);
  log.detail(describeError(cause));
  report.failed.push({ sessionIndex, taskName: task.name, error });
}
