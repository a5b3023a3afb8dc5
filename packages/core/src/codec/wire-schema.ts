import { z } from 'zod';
import { isPriority, type Priority } from '../types/priority.js';

// ============================================================
// Read model (service → client)
// ============================================================

// Identifiers and counts are unsigned 32-bit on the service side.
export const WIRE_INT_MAX = 0xffffffff;
const wireId = () => z.number().int().positive().max(WIRE_INT_MAX);
const wireCount = () => z.number().int().nonnegative().max(WIRE_INT_MAX);

// The service sends null for unset optionals; both null and a missing key mean "absent".
export const DueReadSchema = z.object({
  string: z.string(),
  date: z.string().nullish(),
  datetime: z.string().nullish(),
  timezone: z.string().nullish(),
});
export type DueRead = z.infer<typeof DueReadSchema>;

export const TaskReadSchema = z.object({
  id: wireId().nullish(),
  project_id: wireId().nullish(),
  content: z.string(),
  completed: z.boolean(),
  label_ids: z.array(wireCount()),
  order: wireCount().nullish(),
  indent: z.number().int().min(1).max(5).nullish(),
  priority: z.number().int().refine(isPriority, { message: 'Priority must be a value from 1 to 4' }),
  due: DueReadSchema.nullish(),
  url: z.string().nullish(),
  comment_count: wireCount().nullish(),
});
export type TaskRead = z.infer<typeof TaskReadSchema>;

export const TaskReadListSchema = z.array(TaskReadSchema);

// ============================================================
// Write model (client → service)
// ============================================================

export const DUE_LANG = 'en';

/** At most one due representation per request; no fields at all clears the due date. */
export type DueWriteFields =
  | { readonly due_datetime: string }
  | { readonly due_date: string }
  | { readonly due_string: string; readonly due_lang: typeof DUE_LANG }
  | Record<never, never>;

export type TaskWritePayload = {
  readonly content: string;
  readonly project_id: number | null;
  readonly order: number | null;
  readonly label_ids: readonly number[];
  readonly priority: Priority;
} & DueWriteFields;
