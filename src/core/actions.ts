import type { SessionHandle } from '../browser/session.js';
import { describeSelector } from '../browser/selectors.js';
import { SCROLL_BY_SCRIPT } from '../browser/overlay.js';
import type { ScrollArg } from '../browser/overlay.js';
import type { SelectorStrategy } from '../schema/index.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import { sleep } from '../utils/timing.js';
import { Task } from './task.js';
import type { TaskRunner } from './task.js';

// ── Shared options ───────────────────────────────────────────

export interface TaskMeta {
  name?: string | undefined;
  description?: string | undefined;
}

export interface ElementOptions extends TaskMeta {
  /** Seconds. */
  timeout?: number | undefined;
  by?: SelectorStrategy | undefined;
}

// `by` is only recorded when it differs from the default strategy,
// so that a replayed task records exactly what the original did.
function elementKwargs(options: ElementOptions): Record<string, unknown> {
  const kwargs: Record<string, unknown> = {
    timeout: options.timeout ?? TIMEOUTS.ACTION_TIMEOUT_S,
  };
  if (options.by !== undefined && options.by !== 'css') {
    kwargs['by'] = options.by;
  }
  return kwargs;
}

// ── Primitive actions ────────────────────────────────────────

export async function navigateTo(session: SessionHandle, url: string): Promise<void> {
  await session.navigate(url);
}

export async function clickElement(
  session: SessionHandle,
  selector: string,
  options: ElementOptions = {},
): Promise<void> {
  await session.click(selector, {
    by: options.by,
    timeoutMs: (options.timeout ?? TIMEOUTS.ACTION_TIMEOUT_S) * 1000,
  });
}

export async function fillField(
  session: SessionHandle,
  selector: string,
  text: string,
  options: ElementOptions = {},
): Promise<void> {
  await session.fill(selector, text, {
    by: options.by,
    timeoutMs: (options.timeout ?? TIMEOUTS.ACTION_TIMEOUT_S) * 1000,
  });
}

export async function scrollPage(session: SessionHandle, amount: number): Promise<unknown> {
  const arg: ScrollArg = { amount };
  return session.runScript(SCROLL_BY_SCRIPT, arg);
}

// ── Task builders ────────────────────────────────────────────

export function navigateTask(url: string, meta: TaskMeta = {}): Task {
  return new Task({
    name: meta.name ?? 'navigate',
    kind: 'navigate',
    description: meta.description ?? `Navigate to ${url}`,
    args: [url],
    run: (session) => navigateTo(session, url),
  });
}

export function clickTask(selector: string, options: ElementOptions = {}): Task {
  return new Task({
    name: options.name ?? 'click',
    kind: 'click',
    description:
      options.description ?? `Click ${describeSelector(selector, options.by)}`,
    args: [selector],
    kwargs: elementKwargs(options),
    run: (session) => clickElement(session, selector, options),
  });
}

export function fillTask(
  selector: string,
  text: string,
  options: ElementOptions = {},
): Task {
  return new Task({
    name: options.name ?? 'fill',
    kind: 'fill',
    description:
      options.description ?? `Fill ${describeSelector(selector, options.by)}`,
    args: [selector, text],
    kwargs: elementKwargs(options),
    run: (session) => fillField(session, selector, text, options),
  });
}

export function scrollTask(
  amount: number = LIMITS.DEFAULT_SCROLL_AMOUNT,
  meta: TaskMeta = {},
): Task {
  return new Task({
    name: meta.name ?? 'scroll',
    kind: 'scroll',
    description: meta.description ?? `Scroll by ${String(amount)}px`,
    args: [amount],
    run: (session) => scrollPage(session, amount),
  });
}

export function waitTask(seconds: number, meta: TaskMeta = {}): Task {
  return new Task({
    name: meta.name ?? 'wait',
    kind: 'wait',
    description: meta.description ?? `Wait ${String(seconds)}s`,
    args: [seconds],
    run: () => sleep(seconds * 1000),
  });
}

export interface CustomTaskInit extends TaskMeta {
  name: string;
  args?: readonly unknown[] | undefined;
  kwargs?: Readonly<Record<string, unknown>> | undefined;
  run: TaskRunner;
}

/**
 * Arbitrary behavior. Recorded for the history but never replayed:
 * only its metadata reaches the recording.
 */
export function customTask(init: CustomTaskInit): Task {
  return new Task({
    name: init.name,
    kind: 'custom',
    description: init.description,
    args: init.args,
    kwargs: init.kwargs,
    run: init.run,
  });
}
