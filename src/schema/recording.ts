import { z } from 'zod';

import { jsonValueSchema } from './task.js';

const timestampSchema = z.string().datetime({ offset: true, local: true });

// ── Task snapshot ────────────────────────────────────────────
// `action_kind` stays an open string on load: unknown kinds are
// skipped during replay instead of rejecting the whole document.

export const taskSnapshotSchema = z.object({
  name: z.string(),
  action_kind: z.string().min(1),
  description: z.string(),
  args: z.array(jsonValueSchema),
  kwargs: z.record(jsonValueSchema),
  completed: z.boolean(),
  execution_time_seconds: z.number().nonnegative().nullable(),
  session_index: z.number().int().nonnegative(),
  timestamp: timestampSchema,
});

export type TaskSnapshot = z.infer<typeof taskSnapshotSchema>;

// ── Session record ───────────────────────────────────────────

export const sessionRecordDataSchema = z.object({
  session_index: z.number().int().nonnegative(),
  initial_location: z.string(),
  created_at: timestampSchema,
  tasks: z.array(taskSnapshotSchema),
});

export type SessionRecordData = z.infer<typeof sessionRecordDataSchema>;

// ── Recording document ───────────────────────────────────────

export const recordingSchema = z.object({
  run_id: z.string().min(1),
  created_at: timestampSchema,
  session_count: z.number().int().nonnegative(),
  sessions: z.array(sessionRecordDataSchema),
});

export type Recording = z.infer<typeof recordingSchema>;

// ── Validators ───────────────────────────────────────────────

export function parseRecording(data: unknown): Recording {
  return recordingSchema.parse(data);
}
