// packages/history/src/log-entry.ts
import { z } from "zod";

// -----------------------------
// Primitives
// -----------------------------
const ISO8601 = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "Invalid ISO-8601 timestamp");

export const LogActionSchema = z.enum(["create", "update", "delete", "access"]);
export type LogAction = z.infer<typeof LogActionSchema>;

/**
 * Identifies the entity a log entry belongs to (entity type + primary key).
 */
export type EntityRef = {
  entity_type: string;
  object_pk: string;
};

/**
 * One immutable snapshot row, written by the log store when an entity changed.
 * `serialized_data` is untrusted: usually `{ fields: {...} }`, but may be null
 * or anything else.
 */
export type LogEntry = EntityRef & {
  id: number; // assigned by the store, unique
  object_repr: string;
  action: LogAction;
  timestamp: string; // ISO timestamp (UTC, toISOString form)
  serialized_data: unknown;
};

export const AppendLogEntrySchema = z.object({
  entity_type: z.string().trim().min(1),
  object_pk: z.string().min(1),
  object_repr: z.string().default(""),
  action: LogActionSchema.default("update"),
  timestamp: ISO8601,
  serialized_data: z.unknown().default(null),
});

/**
 * Input for appending a new entry (store assigns id, normalizes timestamp).
 */
export type AppendLogEntryInput = z.input<typeof AppendLogEntrySchema>;

export type TimestampInput = Date | string;

/**
 * Normalize a query/record timestamp to `toISOString()` form (UTC).
 * Precision is milliseconds: finer digits are dropped, so entries that
 * differ only below 1ms become timestamp ties (resolved by id).
 * Years outside 0000-9999 come out as `+010000-...` / `-000001-...`,
 * which do not sort as text; compare with `Date.parse`.
 */
export function normalizeTimestamp(at: TimestampInput): string {
  const ms = at instanceof Date ? at.getTime() : Date.parse(at);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid timestamp: ${String(at)}`);
  }
  return new Date(ms).toISOString();
}

export function parseAppendInput(input: AppendLogEntryInput): Omit<LogEntry, "id"> {
  const parsed = AppendLogEntrySchema.parse(input);
  return {
    entity_type: parsed.entity_type,
    object_pk: parsed.object_pk,
    object_repr: parsed.object_repr,
    action: parsed.action,
    timestamp: normalizeTimestamp(parsed.timestamp),
    serialized_data: parsed.serialized_data ?? null,
  };
}

export function isPlainObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}
