import type { SessionRecordData, TaskSnapshot } from '../schema/index.js';
import { InvalidArgumentError } from './errors.js';
import type { Task } from './task.js';

// ── Session record ───────────────────────────────────────────

/**
 * Append-only history of the tasks one session completed, in
 * completion order. Failed tasks are never captured.
 */
export class SessionRecord {
  readonly index: number;
  readonly initialLocation: string;
  readonly createdAt: Date;

  private readonly entries: TaskSnapshot[] = [];

  constructor(index: number, initialLocation: string, createdAt: Date = new Date()) {
    this.index = index;
    this.initialLocation = initialLocation;
    this.createdAt = createdAt;
  }

  /** Copies of the captured snapshots. */
  get tasks(): readonly TaskSnapshot[] {
    return this.entries.map((entry) => structuredClone(entry));
  }

  /** Snapshot `task` into the history. Only completed tasks are accepted. */
  capture(task: Task, at: Date = new Date()): TaskSnapshot {
    if (!task.completed) {
      throw new InvalidArgumentError(
        `Task "${task.name}" did not complete and cannot be captured`,
      );
    }

    const snapshot: TaskSnapshot = {
      ...task.toCapture(),
      session_index: this.index,
      timestamp: at.toISOString(),
    };
    this.entries.push(snapshot);
    return structuredClone(snapshot);
  }

  toData(): SessionRecordData {
    return {
      session_index: this.index,
      initial_location: this.initialLocation,
      created_at: this.createdAt.toISOString(),
      tasks: this.entries.map((entry) => structuredClone(entry)),
    };
  }
}
