import { describe, it, expect } from 'vitest';

import { FakeSession } from '../testing/fakeSession.js';
import { Task, toJsonValue } from './task.js';

function fakeSession(): FakeSession {
  return new FakeSession({ index: 0, kind: 'chromium', headless: true, position: { x: 0, y: 0 } });
}

describe('toJsonValue', () => {
  it('keeps JSON primitives', () => {
    expect(toJsonValue('a')).toBe('a');
    expect(toJsonValue(3)).toBe(3);
    expect(toJsonValue(false)).toBe(false);
    expect(toJsonValue(null)).toBeNull();
  });

  it('drops values with no JSON form', () => {
    expect(toJsonValue(() => 1)).toBeUndefined();
    expect(toJsonValue(Number.NaN)).toBeUndefined();
    expect(toJsonValue(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(toJsonValue(Symbol('s'))).toBeUndefined();
    expect(toJsonValue(10n)).toBeUndefined();
    expect(toJsonValue(new Date(0))).toBeUndefined();
    expect(toJsonValue(undefined)).toBeUndefined();
  });

  it('filters arrays and plain objects member by member', () => {
    const value = {
      list: [1, () => 2, { gone: undefined, kept: 'x' }],
      fn: () => 0,
    };
    expect(toJsonValue(value)).toEqual({ list: [1, { kept: 'x' }] });
  });
});

describe('Task', () => {
  it('stores the result of a successful run', async () => {
    const task = new Task({ name: 'answer', kind: 'custom', run: async () => 42 });

    await expect(task.execute(fakeSession())).resolves.toBe(42);
    expect(task.completed).toBe(true);
    expect(task.result).toBe(42);
    expect(task.startedAt).toBeInstanceOf(Date);
    expect(task.endedAt).toBeInstanceOf(Date);
    expect(task.executionSeconds).toBeGreaterThanOrEqual(0);
  });

  it('stores and re-raises a failure', async () => {
    const boom = new Error('boom');
    const task = new Task({
      name: 'broken',
      kind: 'custom',
      run: async () => {
        throw boom;
      },
    });

    await expect(task.execute(fakeSession())).rejects.toBe(boom);
    expect(task.completed).toBe(false);
    expect(task.executed).toBe(true);
    expect(task.error).toBe(boom);
  });

  it('refuses to run twice', async () => {
    let runs = 0;
    const task = new Task({
      name: 'once',
      kind: 'custom',
      run: async () => {
        runs++;
      },
    });
    const session = fakeSession();

    await task.execute(session);
    await expect(task.execute(session)).rejects.toThrow('Task "once" has already been executed');
    expect(runs).toBe(1);
  });

  it('has no execution time before it runs', () => {
    const task = new Task({ name: 'idle', kind: 'wait', run: async () => undefined });
    expect(task.executed).toBe(false);
    expect(task.executionSeconds).toBeNull();
  });

  it('defaults the description to the name', () => {
    const task = new Task({ name: 'plain', kind: 'custom', run: async () => undefined });
    expect(task.description).toBe('plain');
  });

  it('drops non-JSON args and kwargs only in the capture', () => {
    const task = new Task({
      name: 'mixed',
      kind: 'custom',
      description: 'mixed values',
      args: ['a', () => 1, 2],
      kwargs: { keep: true, fn: () => 0, nested: { ok: 1, bad: Symbol('x') } },
      run: async () => undefined,
    });

    expect(task.toCapture()).toEqual({
      name: 'mixed',
      action_kind: 'custom',
      description: 'mixed values',
      args: ['a', 2],
      kwargs: { keep: true, nested: { ok: 1 } },
      completed: false,
      execution_time_seconds: null,
    });
    expect(task.args).toHaveLength(3);
  });
});
