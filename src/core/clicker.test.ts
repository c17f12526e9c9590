import { describe, it, expect, vi } from 'vitest';

import { FakeSession } from '../testing/fakeSession.js';
import { sleep } from '../utils/timing.js';
import { ClickLoop, runClickLoop } from './clicker.js';
import type { ClickTarget } from './clicker.js';
import { ResourceExhaustedError, SessionUnreachableError } from './errors.js';

function fleet(...indices: number[]): Map<number, FakeSession> {
  return new Map(
    indices.map((index) => [
      index,
      new FakeSession({ index, kind: 'chromium', headless: true, position: { x: 0, y: 0 } }),
    ]),
  );
}

function target(sessionIndex: number, x: number, y: number, extra: Partial<ClickTarget> = {}): ClickTarget {
  return { sessionIndex, x, y, windowToken: 'window-0', ...extra };
}

describe('ClickLoop', () => {
  it('clicks every target once per tick until stopped', async () => {
    const sessions = fleet(0, 1);
    const loop = new ClickLoop([target(0, 10, 20), target(1, 30, 40)], {
      intervalMs: 100,
      resolveSession: (index) => sessions.get(index),
    });

    await sleep(350);
    const status = await loop.stop();

    expect(status.reason).toBe('stopped');
    expect(status.errors).toBe(0);
    for (const index of [0, 1]) {
      const attempts = status.attempts.get(index) ?? 0;
      expect(attempts).toBeGreaterThanOrEqual(3);
      expect(attempts).toBeLessThanOrEqual(4);
    }
    expect(sessions.get(0)?.pointClicks[0]).toEqual({ x: 10, y: 20 });
    expect(sessions.get(1)?.pointClicks[0]).toEqual({ x: 30, y: 40 });
  });

  it('stops itself after five errors and stop() still resolves', async () => {
    const sessions = fleet(0);
    sessions.get(0)?.failOn('clickAt');
    const loop = new ClickLoop([target(0, 1, 1)], {
      intervalMs: 1,
      resolveSession: (index) => sessions.get(index),
    });

    const status = await loop.done;

    expect(status.reason).toBe('exhausted');
    expect(status.errors).toBe(5);
    expect(status.attempts.get(0)).toBe(5);
    expect(status.lastError).toBeInstanceOf(ResourceExhaustedError);
    await expect(loop.stop()).resolves.toBe(status);
  });

  it('counts a stale window as an error without clicking', async () => {
    const sessions = fleet(0);
    const status = await runClickLoop([target(0, 5, 5, { windowToken: 'window-9' })], {
      intervalMs: 1,
      signal: new AbortController().signal,
      resolveSession: (index) => sessions.get(index),
      maxErrors: 2,
    });

    expect(status.reason).toBe('exhausted');
    expect(status.errors).toBe(2);
    expect(sessions.get(0)?.pointClicks).toEqual([]);
  });

  it('counts a closed session as an error', async () => {
    const status = await runClickLoop([target(4, 5, 5)], {
      intervalMs: 1,
      signal: new AbortController().signal,
      resolveSession: () => undefined,
      maxErrors: 1,
    });

    expect(status.errors).toBe(1);
    expect(status.attempts.get(4)).toBe(1);
  });

  it('keeps the error count across targets and ticks', async () => {
    const sessions = fleet(0, 1);
    sessions.get(1)?.failOn('clickAt', new SessionUnreachableError(1, 'page closed'));

    const status = await runClickLoop([target(0, 1, 1), target(1, 2, 2)], {
      intervalMs: 1,
      signal: new AbortController().signal,
      resolveSession: (index) => sessions.get(index),
    });

    expect(status.reason).toBe('exhausted');
    expect(status.attempts.get(1)).toBe(5);
    expect(status.attempts.get(0)).toBe(5);
    expect(status.ticks).toBe(4);
  });

  it('focuses the picked window before clicking', async () => {
    const sessions = fleet(0);
    const session = sessions.get(0);
    session?.openWindow();
    const controller = new AbortController();

    const status = await runClickLoop([target(0, 9, 9)], {
      intervalMs: 1,
      signal: controller.signal,
      resolveSession: (index) => sessions.get(index),
      onTick: () => controller.abort(),
    });

    expect(status.ticks).toBe(1);
    expect(await session?.activeWindow()).toBe('window-0');
    expect(session?.pointClicks).toEqual([{ x: 9, y: 9 }]);
  });

  it('treats a click that hits nothing as a success', async () => {
    const sessions = fleet(0);
    const session = sessions.get(0);
    if (session) session.hitResult = false;
    const controller = new AbortController();

    const status = await runClickLoop([target(0, 9, 9)], {
      intervalMs: 1,
      signal: controller.signal,
      resolveSession: (index) => sessions.get(index),
      onTick: (tick) => {
        if (tick === 2) controller.abort();
      },
    });

    expect(status.errors).toBe(0);
    expect(status.attempts.get(0)).toBe(2);
  });

  it('skips inactive targets until they are switched on', async () => {
    const sessions = fleet(0, 1);
    const onTick = vi.fn();
    const loop = new ClickLoop([target(0, 1, 1), target(1, 2, 2, { active: false })], {
      intervalMs: 20,
      resolveSession: (index) => sessions.get(index),
      onTick,
    });

    await vi.waitFor(() => {
      expect(onTick).toHaveBeenCalled();
    });
    expect(sessions.get(1)?.pointClicks).toEqual([]);

    loop.setActive(1, true);
    await vi.waitFor(() => {
      expect(sessions.get(1)?.pointClicks.length).toBeGreaterThan(0);
    });
    const status = await loop.stop();
    expect(status.reason).toBe('stopped');
  });

  it('does not start a round once aborted', async () => {
    const sessions = fleet(0);
    const controller = new AbortController();
    controller.abort();

    const status = await runClickLoop([target(0, 1, 1)], {
      intervalMs: 1,
      signal: controller.signal,
      resolveSession: (index) => sessions.get(index),
    });

    expect(status).toMatchObject({ reason: 'stopped', ticks: 0, errors: 0 });
    expect(status.attempts.get(0)).toBe(0);
  });
});
