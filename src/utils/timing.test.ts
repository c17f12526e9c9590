import { describe, it, expect } from 'vitest';

import { elapsedSeconds, sleep } from './timing.js';

describe('elapsedSeconds', () => {
  it('rounds to two decimals', () => {
    expect(elapsedSeconds(new Date(1_000), new Date(2_234))).toBe(1.23);
    expect(elapsedSeconds(new Date(0), new Date(5))).toBe(0.01);
  });
});

describe('sleep', () => {
  it('resolves at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();

    await sleep(5_000, controller.signal);

    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('wakes early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(5_000, controller.signal);

    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1_000);
  });
});
