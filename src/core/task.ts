import type { SessionHandle } from '../browser/session.js';
import type { ActionKind, JsonObject, JsonValue } from '../schema/index.js';
import { elapsedSeconds } from '../utils/timing.js';

// ── Public types ─────────────────────────────────────────────

export type TaskRunner = (session: SessionHandle) => Promise<unknown>;

export interface TaskInit {
  name: string;
  kind: ActionKind;
  description?: string | undefined;
  args?: readonly unknown[] | undefined;
  kwargs?: Readonly<Record<string, unknown>> | undefined;
  run: TaskRunner;
}

/** The serializable part of a task, before it is stamped into a record. */
export interface TaskCapture {
  name: string;
  action_kind: ActionKind;
  description: string;
  args: JsonValue[];
  kwargs: JsonObject;
  completed: boolean;
  execution_time_seconds: number | null;
}

// ── Task ─────────────────────────────────────────────────────

/**
 * A named unit of work bound to one session.
 *
 * `args` and `kwargs` describe the work for recordings; `run` performs
 * it. Builders in `actions.ts` keep the two consistent. Outcome fields
 * are written once, by `execute`.
 */
export class Task {
  readonly name: string;
  readonly kind: ActionKind;
  readonly description: string;
  readonly args: readonly unknown[];
  readonly kwargs: Readonly<Record<string, unknown>>;

  private readonly run: TaskRunner;
  private outcome: {
    startedAt?: Date;
    endedAt?: Date;
    result?: unknown;
    error?: unknown;
    completed: boolean;
  } = { completed: false };

  constructor(init: TaskInit) {
    this.name = init.name;
    this.kind = init.kind;
    this.description = init.description ?? init.name;
    this.args = Object.freeze([...(init.args ?? [])]);
    this.kwargs = Object.freeze({ ...(init.kwargs ?? {}) });
    this.run = init.run;
  }

  get startedAt(): Date | undefined {
    return this.outcome.startedAt;
  }

  get endedAt(): Date | undefined {
    return this.outcome.endedAt;
  }

  get result(): unknown {
    return this.outcome.result;
  }

  get error(): unknown {
    return this.outcome.error;
  }

  get completed(): boolean {
    return this.outcome.completed;
  }

  get executed(): boolean {
    return this.outcome.startedAt !== undefined;
  }

  /** Seconds between start and end, or null if the task never ran. */
  get executionSeconds(): number | null {
    const { startedAt, endedAt } = this.outcome;
    if (!startedAt || !endedAt) return null;
    return elapsedSeconds(startedAt, endedAt);
  }

  /**
   * Run the bound action against `session`. Failures are stored and
   * re-raised; nothing is swallowed here.
   */
  async execute(session: SessionHandle): Promise<unknown> {
    if (this.executed) {
      throw new Error(`Task "${this.name}" has already been executed`);
    }

    const startedAt = new Date();
    this.outcome = { startedAt, completed: false };

    try {
      const result = await this.run(session);
      this.outcome = { startedAt, endedAt: new Date(), result, completed: true };
      return result;
    } catch (err) {
      this.outcome = { startedAt, endedAt: new Date(), error: err, completed: false };
      throw err;
    }
  }

  /** Serializable view; values JSON cannot carry are dropped. */
  toCapture(): TaskCapture {
    return {
      name: this.name,
      action_kind: this.kind,
      description: this.description,
      args: toJsonArray(this.args),
      kwargs: toJsonObject(this.kwargs),
      completed: this.completed,
      execution_time_seconds: this.executionSeconds,
    };
  }
}

// ── JSON filtering ───────────────────────────────────────────

/**
 * Convert `value` to a JSON value, or `undefined` when it has no JSON
 * form (functions, symbols, bigints, class instances, non-finite
 * numbers). Arrays and plain objects are filtered member by member.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'object':
      if (Array.isArray(value)) return toJsonArray(value);
      if (isPlainObject(value)) return toJsonObject(value);
      return undefined;
    default:
      return undefined;
  }
}

function toJsonArray(values: readonly unknown[]): JsonValue[] {
  const out: JsonValue[] = [];
  for (const value of values) {
    const converted = toJsonValue(value);
    if (converted !== undefined) out.push(converted);
  }
  return out;
}

function toJsonObject(record: Readonly<Record<string, unknown>>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    const converted = toJsonValue(value);
    if (converted !== undefined) out[key] = converted;
  }
  return out;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
