import { mkdir, mkdtemp, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import type { Recording } from '../schema/index.js';
import { FakeSession } from '../testing/fakeSession.js';
import { clickTask, navigateTask } from './actions.js';
import { MalformedRecordingError, RecordingNotFoundError } from './errors.js';
import {
  buildRecording,
  listRecordings,
  loadRecording,
  makeRunId,
  recordingFileName,
  resolveRecordingPath,
  saveRecording,
} from './recording.js';
import { SessionRecord } from './sessionRecord.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'browser-fleet-rec-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function sampleRecording(): Promise<Recording> {
  const session = new FakeSession({ index: 0, kind: 'chromium', headless: true, position: { x: 0, y: 0 } });
  const first = new SessionRecord(0, 'https://example.com', new Date('2024-05-01T09:00:00.000Z'));
  const second = new SessionRecord(1, 'about:blank', new Date('2024-05-01T09:00:01.000Z'));

  const go = navigateTask('https://example.org', { name: 'go' });
  await go.execute(session);
  first.capture(go, new Date('2024-05-01T09:00:02.000Z'));

  const press = clickTask('#submit', { name: 'press', timeout: 5, by: 'css' });
  await press.execute(session);
  second.capture(press, new Date('2024-05-01T09:00:03.000Z'));

  return buildRecording({
    runId: '20240501_090000',
    createdAt: new Date('2024-05-01T09:00:00.000Z'),
    sessionCount: 2,
    records: [second, first],
  });
}

describe('run ids', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(makeRunId(new Date(2024, 0, 2, 3, 4, 5))).toBe('20240102_030405');
  });

  it('names recording files after the run id', () => {
    expect(recordingFileName('20240102_030405')).toBe('browser_session_20240102_030405.json');
  });
});

describe('buildRecording', () => {
  it('orders sessions by index and freezes the document', async () => {
    const recording = await sampleRecording();

    expect(recording.sessions.map((s) => s.session_index)).toEqual([0, 1]);
    expect(Object.isFrozen(recording)).toBe(true);
    expect(Object.isFrozen(recording.sessions[1]?.tasks[0]?.kwargs)).toBe(true);
    expect(recording.sessions[1]?.tasks[0]?.kwargs).toEqual({ timeout: 5 });
  });
});

describe('save and load', () => {
  it('writes pretty JSON that loads back unchanged', async () => {
    const recording = await sampleRecording();
    const filePath = await saveRecording(path.join(dir, 'nested'), recording);

    expect(filePath).toBe(path.join(dir, 'nested', 'browser_session_20240501_090000.json'));
    const raw = await readFile(filePath, 'utf-8');
    expect(raw.startsWith('{\n  "run_id": "20240501_090000",\n')).toBe(true);
    expect(raw.endsWith('}\n')).toBe(true);
    await expect(loadRecording(filePath)).resolves.toEqual(recording);
  });

  it('writes identical documents when saved twice', async () => {
    const recording = await sampleRecording();
    const filePath = await saveRecording(dir, recording);
    const firstWrite = await readFile(filePath, 'utf-8');
    await saveRecording(dir, recording);

    expect(await readFile(filePath, 'utf-8')).toBe(firstWrite);
  });

  it('reports a missing file', async () => {
    await expect(loadRecording(path.join(dir, 'absent.json'))).rejects.toBeInstanceOf(
      RecordingNotFoundError,
    );
  });

  it('reports invalid JSON', async () => {
    const filePath = path.join(dir, 'broken.json');
    await writeFile(filePath, '{"run_id": ', 'utf-8');

    await expect(loadRecording(filePath)).rejects.toBeInstanceOf(MalformedRecordingError);
  });

  it('names the first offending field', async () => {
    const filePath = path.join(dir, 'shape.json');
    await writeFile(
      filePath,
      JSON.stringify({
        run_id: 'x',
        created_at: '2024-05-01T09:00:00.000Z',
        session_count: 1,
        sessions: [{ session_index: 0, initial_location: 'about:blank', created_at: 'yesterday', tasks: [] }],
      }),
      'utf-8',
    );

    const error = await loadRecording(filePath).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(MalformedRecordingError);
    expect(error instanceof Error ? error.message : '').toContain(
      `Malformed recording ${filePath}: sessions.0.created_at: `,
    );
  });

  it('accepts unknown action kinds', async () => {
    const filePath = path.join(dir, 'future.json');
    await writeFile(
      filePath,
      JSON.stringify({
        run_id: 'x',
        created_at: '2024-05-01T09:00:00.000Z',
        session_count: 1,
        sessions: [
          {
            session_index: 0,
            initial_location: 'about:blank',
            created_at: '2024-05-01T09:00:00.000Z',
            tasks: [
              {
                name: 'hover',
                action_kind: 'hover',
                description: 'Hover',
                args: [],
                kwargs: {},
                completed: true,
                execution_time_seconds: 0.5,
                session_index: 0,
                timestamp: '2024-05-01T09:00:01.000Z',
              },
            ],
          },
        ],
      }),
      'utf-8',
    );

    const recording = await loadRecording(filePath);
    expect(recording.sessions[0]?.tasks[0]?.action_kind).toBe('hover');
  });
});

describe('resolveRecordingPath', () => {
  beforeEach(async () => {
    await writeFile(path.join(dir, 'browser_session_20240101_000000.json'), '{}', 'utf-8');
  });

  it('takes an existing path as given', async () => {
    const filePath = path.join(dir, 'browser_session_20240101_000000.json');
    await expect(resolveRecordingPath(filePath, '/nowhere')).resolves.toBe(filePath);
  });

  it('finds a file name inside the recording directory', async () => {
    await expect(resolveRecordingPath('browser_session_20240101_000000.json', dir)).resolves.toBe(
      path.join(dir, 'browser_session_20240101_000000.json'),
    );
  });

  it('adds the extension to a bare file name', async () => {
    await expect(resolveRecordingPath('browser_session_20240101_000000', dir)).resolves.toBe(
      path.join(dir, 'browser_session_20240101_000000.json'),
    );
  });

  it('expands a bare run id', async () => {
    await expect(resolveRecordingPath('20240101_000000', dir)).resolves.toBe(
      path.join(dir, 'browser_session_20240101_000000.json'),
    );
  });

  it('prefers <target>.json over the run id file name', async () => {
    await writeFile(path.join(dir, '20240101_000000.json'), '{}', 'utf-8');
    await expect(resolveRecordingPath('20240101_000000', dir)).resolves.toBe(
      path.join(dir, '20240101_000000.json'),
    );
  });

  it('reports a target that matches nothing', async () => {
    await expect(resolveRecordingPath('19990101_000000', dir)).rejects.toThrow(
      'Recording not found: 19990101_000000',
    );
  });
});

describe('listRecordings', () => {
  it('returns nothing for a missing directory', async () => {
    await expect(listRecordings(path.join(dir, 'missing'))).resolves.toEqual([]);
  });

  it('lists recording files newest first', async () => {
    const older = path.join(dir, 'browser_session_20240101_000000.json');
    const newer = path.join(dir, 'browser_session_20240102_000000.json');
    await writeFile(older, '{"a":1}', 'utf-8');
    await writeFile(newer, '{}', 'utf-8');
    await writeFile(path.join(dir, 'notes.txt'), 'x', 'utf-8');
    await writeFile(path.join(dir, 'other.json'), '{}', 'utf-8');
    await mkdir(path.join(dir, 'browser_session_dir.json'));
    await utimes(older, new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T00:00:00Z'));
    await utimes(newer, new Date('2024-01-02T00:00:00Z'), new Date('2024-01-02T00:00:00Z'));

    const entries = await listRecordings(dir);

    expect(entries.map((e) => e.runId)).toEqual(['20240102_000000', '20240101_000000']);
    expect(entries[1]).toMatchObject({
      fileName: 'browser_session_20240101_000000.json',
      path: older,
      sizeBytes: 7,
    });
  });
});
