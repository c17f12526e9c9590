// ── Argument validation ──────────────────────────────────────

export class InvalidArgumentError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

// ── Session lifecycle ────────────────────────────────────────

export class SessionCreationError extends Error {
  readonly sessionIndex: number;

  constructor(sessionIndex: number, cause: unknown) {
    super(`Session ${String(sessionIndex)} failed to start: ${describeError(cause)}`, {
      cause,
    });
    this.name = 'SessionCreationError';
    this.sessionIndex = sessionIndex;
  }
}

export class SessionUnreachableError extends Error {
  readonly sessionIndex: number;

  constructor(sessionIndex: number, reason: string) {
    super(`Session ${String(sessionIndex)} is unreachable: ${reason}`);
    this.name = 'SessionUnreachableError';
    this.sessionIndex = sessionIndex;
  }
}

// ── Task execution ───────────────────────────────────────────

export class TaskExecutionError extends Error {
  readonly sessionIndex: number;
  readonly taskName: string;

  constructor(sessionIndex: number, taskName: string, cause: unknown) {
    super(
      `Task "${taskName}" failed in session ${String(sessionIndex)}: ${describeError(cause)}`,
      { cause },
    );
    this.name = 'TaskExecutionError';
    this.sessionIndex = sessionIndex;
    this.taskName = taskName;
  }
}

// ── Recordings ───────────────────────────────────────────────

export class RecordingNotFoundError extends Error {
  readonly exitCode = 4;
  readonly target: string;

  constructor(target: string) {
    super(`Recording not found: ${target}`);
    this.name = 'RecordingNotFoundError';
    this.target = target;
  }
}

export class MalformedRecordingError extends Error {
  readonly exitCode = 4;
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Malformed recording ${path}: ${reason}`);
    this.name = 'MalformedRecordingError';
    this.path = path;
  }
}

// ── Click loop ───────────────────────────────────────────────

export class ResourceExhaustedError extends Error {
  readonly errorCount: number;

  constructor(errorCount: number) {
    super(`Too many click errors (${String(errorCount)}), click loop stopped`);
    this.name = 'ResourceExhaustedError';
    this.errorCount = errorCount;
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
