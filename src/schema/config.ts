import { z } from 'zod';

// ── Browser kind ─────────────────────────────────────────────

export const browserKindSchema = z.enum(['chromium', 'firefox', 'webkit']);

export type BrowserKind = z.infer<typeof browserKindSchema>;

// ── Recording block ──────────────────────────────────────────

export const recordingConfigSchema = z.object({
  enabled: z.boolean().optional(),
  dir: z.string().min(1).optional(),
});

export type RecordingConfig = z.infer<typeof recordingConfigSchema>;

// ── Full config file ─────────────────────────────────────────

export const fileConfigSchema = z.object({
  browsers: z.number().int().positive().optional(),
  browser: browserKindSchema.optional(),
  headless: z.boolean().optional(),
  continueOnError: z.boolean().optional(),
  clickInterval: z.number().int().positive().optional(),
  recording: recordingConfigSchema.optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
