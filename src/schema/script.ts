import { z } from 'zod';

import { selectorStrategySchema } from './task.js';

// ── Script steps ─────────────────────────────────────────────
// One entry per task; `custom` is absent because a script cannot
// carry executable behavior.

const baseFields = {
  name: z.string().min(1).optional(),
  description: z.string().min(1).optional(),
};

export const navigateStepSchema = z.object({
  ...baseFields,
  action: z.literal('navigate'),
  url: z.string().min(1),
});

export const clickStepSchema = z.object({
  ...baseFields,
  action: z.literal('click'),
  selector: z.string().min(1),
  by: selectorStrategySchema.optional(),
  timeout: z.number().positive().optional(),
});

export const fillStepSchema = z.object({
  ...baseFields,
  action: z.literal('fill'),
  selector: z.string().min(1),
  text: z.string(),
  by: selectorStrategySchema.optional(),
  timeout: z.number().positive().optional(),
});

export const scrollStepSchema = z.object({
  ...baseFields,
  action: z.literal('scroll'),
  amount: z.number().int().optional(),
});

export const waitStepSchema = z.object({
  ...baseFields,
  action: z.literal('wait'),
  seconds: z.number().nonnegative(),
});

export const scriptStepSchema = z.discriminatedUnion('action', [
  navigateStepSchema,
  clickStepSchema,
  fillStepSchema,
  scrollStepSchema,
  waitStepSchema,
]);

export type ScriptStep = z.infer<typeof scriptStepSchema>;

// ── Sessions ─────────────────────────────────────────────────

export const scriptSessionSchema = z.object({
  url: z.string().min(1).optional(),
  steps: z.array(scriptStepSchema),
});

export type ScriptSession = z.infer<typeof scriptSessionSchema>;

export const runScriptSchema = z.object({
  sessions: z.array(scriptSessionSchema).min(1),
});

export type RunScript = z.infer<typeof runScriptSchema>;
