import { z } from 'zod';

import type { SessionHandle } from '../browser/session.js';
import {
  ARM_SELECTION_SCRIPT,
  DISARM_SELECTION_SCRIPT,
  TAKE_SELECTION_SCRIPT,
} from '../browser/overlay.js';
import type { ArmArg } from '../browser/overlay.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { sleep } from '../utils/timing.js';
import { describeError } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export type SelectionState = 'idle' | 'armed' | 'selected';

export interface Point {
  x: number;
  y: number;
}

export type SelectionCallback = (sessionIndex: number, x: number, y: number) => void;

export type SelectionOutcome =
  | { status: 'selected'; point: Point }
  | { status: 'timeout'; attempts: number }
  | { status: 'cancelled' }
  | { status: 'failed'; error: unknown };

export interface ArmOptions {
  signal?: AbortSignal | undefined;
  pollIntervalMs?: number | undefined;
  maxAttempts?: number | undefined;
  message?: string | undefined;
}

const pointSchema = z.object({ x: z.number(), y: z.number() });

const DEFAULT_MESSAGE =
  'Click anywhere on this page to select a position for automated clicking';

// ── Bridge ───────────────────────────────────────────────────

/**
 * Lets a human pick one viewport coordinate per arm call.
 *
 * The page writes at most one point into its mailbox; the host polls
 * with a bounded number of attempts, drains the point exactly once,
 * reports it, then tears the overlay down.
 */
export class CoordinateBridge {
  private readonly states = new Map<number, SelectionState>();
  private readonly pollers = new Map<number, AbortController>();

  state(sessionIndex: number): SelectionState {
    return this.states.get(sessionIndex) ?? 'idle';
  }

  async arm(
    session: SessionHandle,
    onSelected: SelectionCallback,
    options: ArmOptions = {},
  ): Promise<SelectionOutcome> {
    const index = session.index;
    const pollIntervalMs = options.pollIntervalMs ?? TIMEOUTS.SELECTION_POLL_INTERVAL;
    const maxAttempts = options.maxAttempts ?? LIMITS.SELECTION_MAX_ATTEMPTS;

    // A previous arm on the same session is superseded; it leaves the
    // page alone once it sees it no longer owns the session.
    const poller = new AbortController();
    this.pollers.get(index)?.abort();
    this.pollers.set(index, poller);
    await this.disarmQuietly(session);

    const signal = options.signal
      ? AbortSignal.any([options.signal, poller.signal])
      : poller.signal;

    try {
      const arg: ArmArg = {
        sessionIndex: index,
        message: options.message ?? DEFAULT_MESSAGE,
      };
      await session.runScript(ARM_SELECTION_SCRIPT, arg);
      this.states.set(index, 'armed');
      log.session(index, 'waiting for a click to select a position');

      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        if (signal.aborted) {
          if (this.pollers.get(index) === poller) {
            await this.disarmQuietly(session);
          }
          return { status: 'cancelled' };
        }

        const point = pointSchema.safeParse(await session.runScript(TAKE_SELECTION_SCRIPT));
        if (point.success) {
          const { x, y } = point.data;
          this.states.set(index, 'selected');
          log.session(index, `position selected at (${String(x)}, ${String(y)})`);
          try {
            onSelected(index, x, y);
          } finally {
            await this.disarmQuietly(session);
          }
          return { status: 'selected', point: { x, y } };
        }

        await sleep(pollIntervalMs, signal);
      }

      log.warn(`Session ${String(index)}: no position selected after ${String(maxAttempts)} attempts`);
      await this.disarmQuietly(session);
      return { status: 'timeout', attempts: maxAttempts };
    } catch (err) {
      log.error(`Session ${String(index)}: position selection failed: ${describeError(err)}`);
      await this.disarmQuietly(session);
      return { status: 'failed', error: err };
    } finally {
      if (this.pollers.get(index) === poller) {
        this.pollers.delete(index);
      }
    }
  }

  /** Remove overlay, banner and listener. Safe from any state. */
  async disarm(session: SessionHandle): Promise<void> {
    this.states.set(session.index, 'idle');
    await session.runScript(DISARM_SELECTION_SCRIPT);
  }

  private async disarmQuietly(session: SessionHandle): Promise<void> {
    try {
      await this.disarm(session);
    } catch (err) {
      log.detail(`Session ${String(session.index)}: cleanup failed: ${describeError(err)}`);
    }
  }

  /** Abort every running poller. */
  cancelAll(): void {
    for (const poller of this.pollers.values()) {
      poller.abort();
    }
  }
}
