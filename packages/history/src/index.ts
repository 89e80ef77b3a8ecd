export type {
  AppendLogEntryInput,
  EntityRef,
  LogAction,
  LogEntry,
  TimestampInput,
} from "./log-entry.js";
export { AppendLogEntrySchema, LogActionSchema, normalizeTimestamp } from "./log-entry.js";

export type { EntityLogStore } from "./log-store.js";
export { compareNewestFirst, findEntryAtOrBefore, selectLatestAtOrBefore } from "./log-store.js";

export type { FieldState, ObjectState, SerializedFields } from "./state.js";
export { extractSerializedFields, projectField } from "./state.js";

export type { StateLookup, StateLookupOptions } from "./state-lookup.js";
export {
  createStateLookup,
  fetchLogEntry,
  getFieldStateAtTimestamp,
  getObjectStateAtTimestamp,
} from "./state-lookup.js";

export { StateLookupRegistry } from "./registry.js";

export * from "./in-memory-log-store.js";
export * from "./sqlite-log-store.js";
