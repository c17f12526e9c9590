import type { SessionHandle, SessionLauncher } from '../browser/session.js';
import type { BrowserKind, Recording } from '../schema/index.js';
import { LAYOUT, LIMITS, RECORDING, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import { CoordinateBridge } from './bridge.js';
import type {
  ArmOptions,
  Point,
  SelectionCallback,
  SelectionOutcome,
  SelectionState,
} from './bridge.js';
import { ClickLoop } from './clicker.js';
import type { ClickTarget } from './clicker.js';
import {
  InvalidArgumentError,
  SessionCreationError,
  describeError,
} from './errors.js';
import { buildRecording, makeRunId, saveRecording } from './recording.js';
import { emptyReport, executeChains } from './scheduler.js';
import type { ExecutionReport, Submission } from './scheduler.js';
import { SessionRecord } from './sessionRecord.js';
import type { Task } from './task.js';

// ── Public types ─────────────────────────────────────────────

export interface OrchestratorOptions {
  launcher: SessionLauncher;
  recording?: {
    enabled: boolean;
    dir?: string | undefined;
  } | undefined;
  continueOnError?: boolean | undefined;
  runId?: string | undefined;
  now?: (() => Date) | undefined;
}

export interface CreateSessionsOptions {
  kind?: BrowserKind | undefined;
  headless?: boolean | undefined;
  initialLocations?: readonly string[] | undefined;
}

export interface RunReport extends ExecutionReport {
  recordingPath?: string | undefined;
}

export interface PickedPoint extends Point {
  sessionIndex: number;
  windowToken: string;
}

interface ManagedSession {
  handle: SessionHandle;
  record: SessionRecord;
}

export function isBlankLocation(location: string): boolean {
  const trimmed = location.trim();
  return trimmed === '' || trimmed === RECORDING.BLANK_LOCATION;
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Owns a fleet of sessions, their records, the pending task queue and
 * every running selection or click loop.
 *
 * `saveRecording` and `executeAll` must not run concurrently on one
 * instance.
 */
export class Orchestrator {
  readonly runId: string;
  readonly startedAt: Date;
  readonly recordingEnabled: boolean;
  readonly recordingDir: string;
  readonly continueOnError: boolean;

  private readonly launcher: SessionLauncher;
  private readonly now: () => Date;
  private readonly sessions = new Map<number, ManagedSession>();
  private readonly bridge = new CoordinateBridge();
  private readonly loops = new Map<AbortController, Promise<void>>();
  private readonly creations = new Map<AbortController, Promise<void>>();
  private queue: Submission[] = [];
  private nextIndex = 0;

  constructor(options: OrchestratorOptions) {
    this.launcher = options.launcher;
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
    this.runId = options.runId ?? makeRunId(this.startedAt);
    this.recordingEnabled = options.recording?.enabled ?? true;
    this.recordingDir = options.recording?.dir ?? RECORDING.DEFAULT_DIR;
    this.continueOnError = options.continueOnError ?? true;
  }

  // ── Sessions ───────────────────────────────────────────────

  get sessionCount(): number {
    return this.sessions.size;
  }

  get sessionIndices(): number[] {
    return [...this.sessions.keys()].sort((a, b) => a - b);
  }

  hasSession(index: number): boolean {
    return this.sessions.has(index);
  }

  session(index: number): SessionHandle {
    const managed = this.sessions.get(index);
    if (!managed) {
      throw new InvalidArgumentError(`No session with index ${String(index)}`);
    }
    return managed.handle;
  }

  record(index: number): SessionRecord | undefined {
    return this.sessions.get(index)?.record;
  }

  /**
   * Launch `count` sessions. Sessions that fail to start are logged
   * and skipped, so the result may be shorter than `count`. A
   * `closeAll` during the launch stops it; a handle that comes up
   * after that is closed instead of registered.
   */
  async createSessions(
    count: number,
    options: CreateSessionsOptions = {},
  ): Promise<SessionHandle[]> {
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidArgumentError(`Session count must be a positive integer, got ${String(count)}`);
    }
    const locations = options.initialLocations;
    if (locations !== undefined && locations.length !== count) {
      throw new InvalidArgumentError(
        `Expected ${String(count)} initial locations, got ${String(locations.length)}`,
      );
    }

    // Nothing held: start from index 0 even if earlier launches all failed.
    if (this.sessions.size === 0 && this.creations.size === 0) {
      this.nextIndex = 0;
    }

    const controller = new AbortController();
    const work = this.launchAll(count, locations, options, controller.signal);
    this.creations.set(
      controller,
      work.then(() => {
        this.creations.delete(controller);
      }),
    );
    return work;
  }

  private async launchAll(
    count: number,
    locations: readonly string[] | undefined,
    options: CreateSessionsOptions,
    signal: AbortSignal,
  ): Promise<SessionHandle[]> {
    const created: SessionHandle[] = [];
    for (let i = 0; i < count && !signal.aborted; i++) {
      const index = this.nextIndex++;
      const location = locations?.[i] ?? RECORDING.BLANK_LOCATION;

      let handle: SessionHandle;
      try {
        handle = await this.launchOne(index, location, options);
      } catch (err) {
        log.error(new SessionCreationError(index, err).message);
        continue;
      }

      if (signal.aborted) {
        await handle.close().catch((closeErr: unknown) => {
          log.detail(`close after shutdown: ${describeError(closeErr)}`);
        });
        break;
      }

      this.sessions.set(index, {
        handle,
        record: new SessionRecord(index, location, this.now()),
      });
      created.push(handle);
      log.session(index, `ready (${String(i + 1)}/${String(count)})`);
    }

    if (signal.aborted) {
      log.warn(`Session creation stopped after ${String(created.length)} of ${String(count)}`);
    }
    return created;
  }

  private async launchOne(
    index: number,
    location: string,
    options: CreateSessionsOptions,
  ): Promise<SessionHandle> {
    const handle = await this.launcher.launch({
      index,
      kind: options.kind ?? 'chromium',
      headless: options.headless ?? false,
      position: { x: index * LAYOUT.WINDOW_OFFSET, y: index * LAYOUT.WINDOW_OFFSET },
    });

    if (isBlankLocation(location)) return handle;

    try {
      await handle.navigate(location);
      return handle;
    } catch (err) {
      await handle.close().catch((closeErr: unknown) => {
        log.detail(`close after failed start: ${describeError(closeErr)}`);
      });
      throw err;
    }
  }

  // ── Tasks ──────────────────────────────────────────────────

  get pendingTasks(): number {
    return this.queue.length;
  }

  addTask(task: Task, sessionIndex: number): void {
    if (!this.sessions.has(sessionIndex)) {
      throw new InvalidArgumentError(`Session index ${String(sessionIndex)} is out of range`);
    }
    this.queue.push({ task, sessionIndex });
  }

  /**
   * Run every queued task: parallel across sessions, serial within one.
   * Successful tasks are captured into their session record as they
   * complete. Saves a recording afterwards when recording is enabled.
   */
  async executeAll(): Promise<RunReport> {
    if (this.queue.length === 0) {
      log.warn('No tasks to execute');
      return emptyReport();
    }

    const submissions = this.queue;
    this.queue = [];

    const report: RunReport = await executeChains(submissions, {
      continueOnError: this.continueOnError,
      resolveSession: (index) => this.sessions.get(index)?.handle,
      onSuccess: (task, index) => {
        this.sessions.get(index)?.record.capture(task, this.now());
      },
    });

    log.info(
      `Completed ${String(report.completed.length)} task(s), ${String(report.failed.length)} failed`,
    );

    if (this.recordingEnabled) {
      report.recordingPath = await this.saveRecording();
    }
    return report;
  }

  // ── Recording ──────────────────────────────────────────────

  snapshot(): Recording {
    return buildRecording({
      runId: this.runId,
      createdAt: this.startedAt,
      sessionCount: this.sessions.size,
      records: [...this.sessions.values()].map((s) => s.record),
    });
  }

  async saveRecording(): Promise<string> {
    const filePath = await saveRecording(this.recordingDir, this.snapshot());
    log.info(`Saved session recording to ${filePath}`);
    return filePath;
  }

  // ── Coordinate selection ───────────────────────────────────

  selectionState(index: number): SelectionState {
    return this.bridge.state(index);
  }

  /**
   * Arm session `index` for one human click. The window the click
   * happened in is returned with the point for the click loop.
   */
  async selectCoordinate(
    index: number,
    onSelected?: SelectionCallback,
    options: Omit<ArmOptions, 'signal'> = {},
  ): Promise<{ outcome: SelectionOutcome; picked?: PickedPoint }> {
    const handle = this.session(index);
    const controller = new AbortController();

    const run = async (): Promise<{ outcome: SelectionOutcome; picked?: PickedPoint }> => {
      let windowToken: string;
      try {
        windowToken = await handle.activeWindow();
      } catch (err) {
        log.error(`Session ${String(index)}: ${describeError(err)}`);
        return { outcome: { status: 'failed', error: err } };
      }

      const outcome = await this.bridge.arm(handle, onSelected ?? (() => undefined), {
        ...options,
        signal: controller.signal,
      });
      if (outcome.status !== 'selected') return { outcome };
      return { outcome, picked: { sessionIndex: index, windowToken, ...outcome.point } };
    };

    const work = run();
    this.track(controller, work);
    return work;
  }

  /** Start clicking every target each `intervalMs` until stopped. */
  startClicking(
    targets: readonly ClickTarget[],
    intervalMs: number = LIMITS.DEFAULT_CLICK_INTERVAL,
  ): ClickLoop {
    for (const target of targets) {
      if (!this.sessions.has(target.sessionIndex)) {
        throw new InvalidArgumentError(`Session index ${String(target.sessionIndex)} is out of range`);
      }
    }
    if (!(intervalMs > 0)) {
      throw new InvalidArgumentError(`Click interval must be positive, got ${String(intervalMs)}`);
    }

    const controller = new AbortController();
    const loop = new ClickLoop(targets, {
      intervalMs,
      signal: controller.signal,
      resolveSession: (index) => this.sessions.get(index)?.handle,
    });
    this.track(controller, loop.done);
    return loop;
  }

  // Both kinds of loop resolve with a status instead of rejecting.
  private track(controller: AbortController, work: Promise<unknown>): void {
    this.loops.set(
      controller,
      work.then(() => {
        this.loops.delete(controller);
      }),
    );
  }

  // ── Shutdown ───────────────────────────────────────────────

  /**
   * Stop pending launches and every loop, give the loops a moment to
   * notice, then close every session. A failing close is logged and
   * does not block the rest.
   */
  async closeAll(): Promise<void> {
    const creating = [...this.creations.entries()];
    for (const [controller] of creating) {
      controller.abort();
    }
    const pending = [...this.loops.entries()];
    for (const [controller] of pending) {
      controller.abort();
    }
    this.bridge.cancelAll();

    if (pending.length > 0) {
      const grace = new AbortController();
      await Promise.race([
        Promise.all(pending.map(([, done]) => done)),
        sleep(TIMEOUTS.CLOSE_GRACE, grace.signal),
      ]);
      grace.abort();
    }

    // A launch in flight settles before its sessions can be collected.
    await Promise.all(creating.map(([, done]) => done));

    const sessions = [...this.sessions.entries()];
    this.sessions.clear();
    this.queue = [];
    if (this.creations.size === 0) {
      this.nextIndex = 0;
    }

    const results = await Promise.allSettled(
      sessions.map(([, managed]) => managed.handle.close()),
    );
    results.forEach((result, i) => {
      const index = sessions[i]?.[0] ?? -1;
      if (result.status === 'rejected') {
        log.error(`Error closing session ${String(index)}: ${describeError(result.reason)}`);
      } else {
        log.session(index, 'closed');
      }
    });
  }
}
