import { describe, it, expect, vi } from 'vitest';

import { FakeSession } from '../testing/fakeSession.js';
import { CoordinateBridge } from './bridge.js';
import { SessionUnreachableError } from './errors.js';

function fakeSession(index = 0): FakeSession {
  return new FakeSession({ index, kind: 'chromium', headless: true, position: { x: 0, y: 0 } });
}

describe('CoordinateBridge', () => {
  it('reports one click, then tears the overlay down', async () => {
    const bridge = new CoordinateBridge();
    const session = fakeSession(0);
    const onSelected = vi.fn();
    session.selectOnArm(120, 240);

    const outcome = await bridge.arm(session, onSelected, { pollIntervalMs: 1 });

    expect(outcome).toEqual({ status: 'selected', point: { x: 120, y: 240 } });
    expect(onSelected).toHaveBeenCalledTimes(1);
    expect(onSelected).toHaveBeenCalledWith(0, 120, 240);
    expect(bridge.state(0)).toBe('idle');
    expect(session.overlayVisible).toBe(false);

    expect(session.userClick(300, 300)).toBe(false);
    expect(onSelected).toHaveBeenCalledTimes(1);
  });

  it('is armed while waiting and rounds the picked point', async () => {
    const bridge = new CoordinateBridge();
    const session = fakeSession(3);
    const onSelected = vi.fn();

    const pending = bridge.arm(session, onSelected, { pollIntervalMs: 2, maxAttempts: 2_000 });
    await vi.waitFor(() => {
      expect(bridge.state(3)).toBe('armed');
    });
    expect(session.overlayVisible).toBe(true);

    expect(session.userClick(10.6, 20.2)).toBe(true);
    await expect(pending).resolves.toEqual({ status: 'selected', point: { x: 11, y: 20 } });
    expect(onSelected).toHaveBeenCalledWith(3, 11, 20);
    expect(bridge.state(3)).toBe('idle');
  });

  it('gives up after the attempt budget without calling back', async () => {
    const bridge = new CoordinateBridge();
    const session = fakeSession();
    const onSelected = vi.fn();

    const outcome = await bridge.arm(session, onSelected, { pollIntervalMs: 1, maxAttempts: 3 });

    expect(outcome).toEqual({ status: 'timeout', attempts: 3 });
    expect(onSelected).not.toHaveBeenCalled();
    expect(bridge.state(0)).toBe('idle');
    expect(session.overlayVisible).toBe(false);
  });

  it('stops polling when cancelled', async () => {
    const bridge = new CoordinateBridge();
    const session = fakeSession();
    const controller = new AbortController();

    const pending = bridge.arm(session, vi.fn(), {
      signal: controller.signal,
      pollIntervalMs: 5,
      maxAttempts: 2_000,
    });
    await vi.waitFor(() => {
      expect(session.armCount).toBe(1);
    });
    controller.abort();

    await expect(pending).resolves.toEqual({ status: 'cancelled' });
    expect(session.overlayVisible).toBe(false);
    expect(bridge.state(0)).toBe('idle');
  });

  it('lets a new arm supersede a pending one', async () => {
    const bridge = new CoordinateBridge();
    const session = fakeSession();
    const first = vi.fn();
    const second = vi.fn();

    const pendingFirst = bridge.arm(session, first, { pollIntervalMs: 5, maxAttempts: 2_000 });
    await vi.waitFor(() => {
      expect(session.armCount).toBe(1);
    });

    session.selectOnArm(7, 8);
    const secondOutcome = await bridge.arm(session, second, { pollIntervalMs: 1 });

    await expect(pendingFirst).resolves.toEqual({ status: 'cancelled' });
    expect(secondOutcome).toEqual({ status: 'selected', point: { x: 7, y: 8 } });
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('surfaces an unreachable session as a failed outcome', async () => {
    const bridge = new CoordinateBridge();
    const session = fakeSession();
    session.closed = true;

    const outcome = await bridge.arm(session, vi.fn(), { pollIntervalMs: 1 });

    expect(outcome.status).toBe('failed');
    expect(outcome.status === 'failed' ? outcome.error : null).toBeInstanceOf(SessionUnreachableError);
  });

  it('still disarms when the callback throws', async () => {
    const bridge = new CoordinateBridge();
    const session = fakeSession();
    session.selectOnArm(1, 2);

    const outcome = await bridge.arm(
      session,
      () => {
        throw new Error('callback broke');
      },
      { pollIntervalMs: 1 },
    );

    expect(outcome.status).toBe('failed');
    expect(session.overlayVisible).toBe(false);
    expect(bridge.state(0)).toBe('idle');
  });

  it('can disarm a session that was never armed', async () => {
    const bridge = new CoordinateBridge();
    const session = fakeSession();

    await bridge.disarm(session);
    await bridge.disarm(session);

    expect(bridge.state(0)).toBe('idle');
    expect(session.disarmCount).toBe(2);
  });
});
