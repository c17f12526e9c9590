import { z } from 'zod';

// ── Action kind ──────────────────────────────────────────────

export const actionKindSchema = z.enum([
  'navigate',
  'click',
  'fill',
  'wait',
  'scroll',
  'custom',
]);

export type ActionKind = z.infer<typeof actionKindSchema>;

// ── Selector strategy ────────────────────────────────────────

export const selectorStrategySchema = z.enum(['css', 'xpath', 'id', 'name', 'text', 'testid']);

export type SelectorStrategy = z.infer<typeof selectorStrategySchema>;

// ── JSON values ──────────────────────────────────────────────
// Only these survive into a session record.

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export type JsonObject = { [key: string]: JsonValue };
