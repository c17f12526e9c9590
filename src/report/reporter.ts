import type { RecordingEntry } from '../core/recording.js';
import type { ReplayResult } from '../core/replay.js';
import type { RunReport } from '../core/orchestrator.js';
import { describeError } from '../core/errors.js';

// ── JSON generators ──────────────────────────────────────────

export const JSON_OUTPUT_VERSION = 1;

export interface RunJson {
  version: number;
  runId: string;
  exitCode: number;
  recordingPath: string | null;
  completed: { session: number; task: string; seconds: number | null }[];
  failed: { session: number; task: string; error: string }[];
  skipped: { session: number; task: string }[];
}

export interface RecordingsJson {
  version: number;
  recordings: {
    runId: string;
    file: string;
    path: string;
    sizeBytes: number;
    modifiedAt: string;
  }[];
}

export function generateRunJSON(runId: string, report: RunReport, exitCode: number): RunJson {
  return {
    version: JSON_OUTPUT_VERSION,
    runId,
    exitCode,
    recordingPath: report.recordingPath ?? null,
    completed: report.completed.map((c) => ({
      session: c.sessionIndex,
      task: c.taskName,
      seconds: c.seconds,
    })),
    failed: report.failed.map((f) => ({
      session: f.sessionIndex,
      task: f.taskName,
      error: describeError(f.error.cause ?? f.error),
    })),
    skipped: report.skipped.map((s) => ({ session: s.sessionIndex, task: s.taskName })),
  };
}

export function generateRecordingsJSON(entries: readonly RecordingEntry[]): RecordingsJson {
  return {
    version: JSON_OUTPUT_VERSION,
    recordings: entries.map((e) => ({
      runId: e.runId,
      file: e.fileName,
      path: e.path,
      sizeBytes: e.sizeBytes,
      modifiedAt: e.modifiedAt.toISOString(),
    })),
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: RunJson | RecordingsJson): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Text formatters ──────────────────────────────────────────

export function formatRecordingsTable(entries: readonly RecordingEntry[]): string {
  if (entries.length === 0) return 'No recordings found.';

  const rows = entries.map((e) => [
    e.runId,
    formatTimestamp(e.modifiedAt),
    formatSize(e.sizeBytes),
    e.fileName,
  ]);
  return renderTable(['Run ID', 'Modified', 'Size', 'File'], rows);
}

export function formatRunSummary(runId: string, report: RunReport): string {
  const lines: string[] = [];
  lines.push('--- browser-fleet run ---');
  lines.push(`Run ID:     ${runId}`);
  lines.push(
    `Tasks:      ${String(report.completed.length)} completed, ` +
      `${String(report.failed.length)} failed, ${String(report.skipped.length)} skipped`,
  );
  for (const failure of report.failed) {
    lines.push(
      `  ✗ [session ${String(failure.sessionIndex)}] ${failure.taskName}: ` +
        describeError(failure.error.cause ?? failure.error),
    );
  }
  if (report.recordingPath !== undefined) {
    lines.push(`Recording:  ${report.recordingPath}`);
  }
  return lines.join('\n');
}

export function formatReplaySummary(runId: string, result: ReplayResult): string {
  const lines = [
    '--- browser-fleet replay ---',
    `Source run: ${runId}`,
    `Sessions:   ${String(result.sessionsCreated)} created`,
    `Tasks:      ${String(result.submitted)} replayed, ${String(result.skipped.length)} not replayable`,
  ];
  if (result.skippedSessions.length > 0) {
    lines.push(`Skipped sessions: ${result.skippedSessions.join(', ')}`);
  }
  if (result.report.failed.length > 0) {
    lines.push(`Failures:   ${String(result.report.failed.length)}`);
  }
  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function renderTable(header: readonly string[], rows: readonly string[][]): string {
  const widths = header.map((h, col) =>
    Math.max(h.length, ...rows.map((row) => (row[col] ?? '').length)),
  );
  const line = (cells: readonly string[]): string =>
    cells
      .map((cell, col) => cell.padEnd(widths[col] ?? cell.length))
      .join('  ')
      .trimEnd();

  return [line(header), line(widths.map((w) => '-'.repeat(w))), ...rows.map(line)].join('\n');
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${String(bytes)} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function formatTimestamp(at: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${String(at.getFullYear())}-${pad(at.getMonth() + 1)}-${pad(at.getDate())} ` +
    `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`
  );
}
