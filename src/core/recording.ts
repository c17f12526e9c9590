import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { parseRecording } from '../schema/index.js';
import type { Recording } from '../schema/index.js';
import { RECORDING } from '../config/defaults.js';
import { MalformedRecordingError, RecordingNotFoundError } from './errors.js';
import type { SessionRecord } from './sessionRecord.js';

// ── Run ids and file names ───────────────────────────────────

/** `YYYYMMDD_HHMMSS` in local time. */
export function makeRunId(at: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${String(at.getFullYear())}${pad(at.getMonth() + 1)}${pad(at.getDate())}` +
    `_${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`
  );
}

export function recordingFileName(runId: string): string {
  return `${RECORDING.FILE_PREFIX}${runId}${RECORDING.FILE_EXTENSION}`;
}

// ── Build ────────────────────────────────────────────────────

export interface RecordingInput {
  runId: string;
  createdAt: Date;
  sessionCount: number;
  records: readonly SessionRecord[];
}

/** Snapshot the records into a frozen recording document. */
export function buildRecording(input: RecordingInput): Recording {
  const recording: Recording = {
    run_id: input.runId,
    created_at: input.createdAt.toISOString(),
    session_count: input.sessionCount,
    sessions: [...input.records]
      .sort((a, b) => a.index - b.index)
      .map((record) => record.toData()),
  };
  return deepFreeze(recording);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
    Object.freeze(value);
  }
  return value;
}

// ── Save ─────────────────────────────────────────────────────

export async function saveRecording(dir: string, recording: Recording): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, recordingFileName(recording.run_id));
  await writeFile(filePath, JSON.stringify(recording, null, 2) + '\n', 'utf-8');
  return filePath;
}

// ── Load ─────────────────────────────────────────────────────

/** Parse and validate a recording file. Executes nothing. */
export async function loadRecording(filePath: string): Promise<Recording> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) throw new RecordingNotFoundError(filePath);
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'invalid JSON';
    throw new MalformedRecordingError(filePath, reason);
  }

  try {
    return parseRecording(parsed);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new MalformedRecordingError(filePath, describeIssue(err));
    }
    throw err;
  }
}

function describeIssue(err: ZodError): string {
  const issue = err.issues[0];
  if (!issue) return 'invalid document';
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

// ── Resolve ──────────────────────────────────────────────────

/**
 * Find the recording `target` refers to. Tried in order: the path as
 * given, a file name in `dir`, `<target>.json` in `dir`, and the file
 * name for run id `target` in `dir`.
 */
export async function resolveRecordingPath(target: string, dir: string): Promise<string> {
  const candidates = [target, path.join(dir, target)];
  if (!target.endsWith(RECORDING.FILE_EXTENSION)) {
    candidates.push(
      path.join(dir, `${target}${RECORDING.FILE_EXTENSION}`),
      path.join(dir, recordingFileName(target)),
    );
  }

  for (const candidate of candidates) {
    if (await isFile(candidate)) return candidate;
  }
  throw new RecordingNotFoundError(target);
}

// ── List ─────────────────────────────────────────────────────

export interface RecordingEntry {
  runId: string;
  fileName: string;
  path: string;
  sizeBytes: number;
  modifiedAt: Date;
}

/** Recordings in `dir`, newest first. A missing directory has none. */
export async function listRecordings(dir: string): Promise<RecordingEntry[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }

  const entries: RecordingEntry[] = [];
  for (const fileName of names) {
    if (
      !fileName.startsWith(RECORDING.FILE_PREFIX) ||
      !fileName.endsWith(RECORDING.FILE_EXTENSION)
    ) {
      continue;
    }
    const filePath = path.join(dir, fileName);
    const info = await stat(filePath);
    if (!info.isFile()) continue;

    entries.push({
      runId: fileName.slice(
        RECORDING.FILE_PREFIX.length,
        -RECORDING.FILE_EXTENSION.length,
      ),
      fileName,
      path: filePath,
      sizeBytes: info.size,
      modifiedAt: info.mtime,
    });
  }

  return entries.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
}

// ── Helpers ──────────────────────────────────────────────────

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isFile();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
