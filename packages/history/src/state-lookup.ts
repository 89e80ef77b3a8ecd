// packages/history/src/state-lookup.ts
import type { EntityRef, LogEntry, TimestampInput } from "./log-entry.js";
import { normalizeTimestamp } from "./log-entry.js";
import type { EntityLogStore } from "./log-store.js";
import { findEntryAtOrBefore } from "./log-store.js";
import type { FieldState, ObjectState } from "./state.js";
import { extractSerializedFields, projectField } from "./state.js";

/**
 * Reconstruct an entity's serialized state as of `at`:
 * picks the newest entry with timestamp <= at and reads its fields.
 * Store errors propagate untouched; "nothing logged yet" is a result.
 */
export async function getObjectStateAtTimestamp(
  store: EntityLogStore,
  ref: EntityRef,
  at: TimestampInput
): Promise<ObjectState> {
  const entry = await findEntryAtOrBefore(store, ref, normalizeTimestamp(at));

  // Exit if no entry at or before the target
  if (!entry) return { log_found: false };

  const serialized_fields = extractSerializedFields(entry.serialized_data);

  return {
    log_found: true,
    ...(serialized_fields ? { serialized_fields } : {}),
    timestamp: entry.timestamp,
    log_entry_id: entry.id,
  };
}

/**
 * Field-level lookup, layered on the object-level one so both always agree
 * on which entry is current as of `at`.
 */
export async function getFieldStateAtTimestamp(
  store: EntityLogStore,
  ref: EntityRef,
  field_name: string,
  at: TimestampInput
): Promise<FieldState> {
  const state = await getObjectStateAtTimestamp(store, ref, at);
  return projectField(state, field_name);
}

/**
 * Explicit follow-up read of the entry a result points at.
 */
export async function fetchLogEntry(
  store: EntityLogStore,
  state: ObjectState | FieldState
): Promise<LogEntry | null> {
  if (!state.log_found) return null;
  return store.getEntry(state.log_entry_id);
}

export type StateLookupOptions<E> = {
  store: EntityLogStore;
  refFor: (entity: E) => EntityRef;
};

/**
 * Lookup bound to one kind of entity: `refFor` says which log entries
 * belong to a given instance.
 */
export type StateLookup<E> = {
  store: EntityLogStore;
  getObjectStateAtTimestamp(entity: E, at: TimestampInput): Promise<ObjectState>;
  getFieldStateAtTimestamp(entity: E, field_name: string, at: TimestampInput): Promise<FieldState>;
  fetchLogEntry(state: ObjectState | FieldState): Promise<LogEntry | null>;
};

export function createStateLookup<E>(opts: StateLookupOptions<E>): StateLookup<E> {
  const { store, refFor } = opts;
  return {
    store,
    getObjectStateAtTimestamp: (entity, at) => getObjectStateAtTimestamp(store, refFor(entity), at),
    getFieldStateAtTimestamp: (entity, field_name, at) =>
      getFieldStateAtTimestamp(store, refFor(entity), field_name, at),
    fetchLogEntry: (state) => fetchLogEntry(store, state),
  };
}
