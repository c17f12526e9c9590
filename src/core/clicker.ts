import type { SessionHandle } from '../browser/session.js';
import { CLICK_AT_POINT_SCRIPT } from '../browser/overlay.js';
import type { PointArg } from '../browser/overlay.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import {
  ResourceExhaustedError,
  SessionUnreachableError,
  describeError,
} from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface ClickTarget {
  sessionIndex: number;
  x: number;
  y: number;
  /** Window the point was picked in. */
  windowToken: string;
  active?: boolean | undefined;
}

export interface ClickLoopOptions {
  intervalMs: number;
  signal: AbortSignal;
  resolveSession(index: number): SessionHandle | undefined;
  maxErrors?: number | undefined;
  isActive?(sessionIndex: number): boolean;
  onTick?(tick: number): void;
}

export type ClickLoopReason = 'stopped' | 'exhausted';

export interface ClickLoopStatus {
  reason: ClickLoopReason;
  ticks: number;
  /** Click attempts per session index, failed ones included. */
  attempts: Map<number, number>;
  errors: number;
  lastError?: unknown;
}

// ── Loop ─────────────────────────────────────────────────────

/**
 * Click every active target once per tick, sleeping `intervalMs`
 * between ticks, until `signal` aborts or the cumulative error count
 * reaches `maxErrors`. Never rejects.
 */
export async function runClickLoop(
  targets: readonly ClickTarget[],
  options: ClickLoopOptions,
): Promise<ClickLoopStatus> {
  const maxErrors = options.maxErrors ?? LIMITS.CLICK_MAX_ERRORS;
  const status: ClickLoopStatus = {
    reason: 'stopped',
    ticks: 0,
    attempts: new Map(targets.map((t) => [t.sessionIndex, 0])),
    errors: 0,
  };

  while (!options.signal.aborted) {
    for (const target of targets) {
      if (options.signal.aborted) break;
      if (!isActive(target, options)) continue;

      status.attempts.set(
        target.sessionIndex,
        (status.attempts.get(target.sessionIndex) ?? 0) + 1,
      );

      try {
        await clickTarget(target, options);
      } catch (err) {
        status.errors++;
        status.lastError = err;
        log.error(
          `Click failed in session ${String(target.sessionIndex)} ` +
            `(${String(status.errors)}/${String(maxErrors)}): ${describeError(err)}`,
        );

        if (status.errors >= maxErrors) {
          const exhausted = new ResourceExhaustedError(status.errors);
          log.warn(exhausted.message);
          status.reason = 'exhausted';
          status.lastError = exhausted;
          return status;
        }
      }
    }

    if (options.signal.aborted) break;
    status.ticks++;
    options.onTick?.(status.ticks);
    await sleep(options.intervalMs, options.signal);
  }

  return status;
}

function isActive(target: ClickTarget, options: ClickLoopOptions): boolean {
  if (options.isActive) return options.isActive(target.sessionIndex);
  return target.active ?? true;
}

async function clickTarget(target: ClickTarget, options: ClickLoopOptions): Promise<void> {
  const session = options.resolveSession(target.sessionIndex);
  if (!session) {
    throw new SessionUnreachableError(target.sessionIndex, 'session is closed');
  }

  // The session may have opened other windows since the point was picked.
  const tokens = await session.windowTokens();
  if (!tokens.includes(target.windowToken)) {
    throw new SessionUnreachableError(
      target.sessionIndex,
      `window ${target.windowToken} is gone`,
    );
  }
  if ((await session.activeWindow()) !== target.windowToken) {
    await session.focus(target.windowToken);
  }

  const arg: PointArg = { x: target.x, y: target.y };
  const hit = await session.runScript(CLICK_AT_POINT_SCRIPT, arg);
  if (hit === true) {
    log.click(`session ${String(target.sessionIndex)} at (${String(target.x)}, ${String(target.y)})`);
  } else {
    log.warn(
      `Session ${String(target.sessionIndex)}: no element at (${String(target.x)}, ${String(target.y)})`,
    );
  }
}

// ── Handle ───────────────────────────────────────────────────

/**
 * A running click loop. `stop()` is cooperative: an in-flight click
 * finishes, then the loop resolves its final status.
 */
export class ClickLoop {
  readonly done: Promise<ClickLoopStatus>;

  private readonly controller = new AbortController();
  private readonly activity = new Map<number, boolean>();

  constructor(
    targets: readonly ClickTarget[],
    options: Omit<ClickLoopOptions, 'signal' | 'isActive'> & {
      signal?: AbortSignal | undefined;
    },
  ) {
    for (const target of targets) {
      this.activity.set(target.sessionIndex, target.active ?? true);
    }

    const signal = options.signal
      ? AbortSignal.any([options.signal, this.controller.signal])
      : this.controller.signal;

    this.done = runClickLoop(targets, {
      ...options,
      signal,
      isActive: (index) => this.activity.get(index) ?? false,
    });
  }

  setActive(sessionIndex: number, active: boolean): void {
    if (this.activity.has(sessionIndex)) {
      this.activity.set(sessionIndex, active);
    }
  }

  async stop(): Promise<ClickLoopStatus> {
    this.controller.abort();
    return this.done;
  }
}
