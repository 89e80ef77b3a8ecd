// packages/history/src/state.ts
import { isPlainObject } from "./log-entry.js";

export type SerializedFields = Record<string, unknown>;

/**
 * State of a whole entity at a point in time.
 * `serialized_fields` is omitted when the selected entry carried no
 * (or an empty) fields mapping.
 */
export type ObjectState =
  | { log_found: false }
  | {
      log_found: true;
      serialized_fields?: SerializedFields;
      timestamp: string; // timestamp of the selected entry
      log_entry_id: number;
    };

/**
 * State of a single field at a point in time.
 */
export type FieldState =
  | { log_found: false; field_found: false; field_name: string }
  | {
      log_found: true;
      field_found: false;
      field_name: string;
      timestamp: string;
      log_entry_id: number;
    }
  | {
      log_found: true;
      field_found: true;
      field_name: string;
      value: unknown;
      timestamp: string;
      log_entry_id: number;
    };

function clone<T>(x: T): T {
  // serialized data is plain JSON here
  return JSON.parse(JSON.stringify(x)) as T;
}

/**
 * Pull the `fields` mapping out of an entry's serialized data.
 * - not an object, or `fields` not an object -> undefined
 * - empty mapping -> undefined (empty counts as "no fields")
 * - otherwise a copy, so callers cannot reach the stored entry
 */
export function extractSerializedFields(serialized_data: unknown): SerializedFields | undefined {
  if (!isPlainObject(serialized_data)) return undefined;

  const fields = serialized_data.fields ?? {};
  if (!isPlainObject(fields)) return undefined;
  if (Object.keys(fields).length === 0) return undefined;

  return clone(fields);
}

export function projectField(state: ObjectState, field_name: string): FieldState {
  if (!state.log_found) {
    return { log_found: false, field_found: false, field_name };
  }

  const carried = {
    log_found: true as const,
    field_name,
    timestamp: state.timestamp,
    log_entry_id: state.log_entry_id,
  };

  const fields = state.serialized_fields;
  if (!fields || !Object.hasOwn(fields, field_name)) {
    return { ...carried, field_found: false };
  }

  return { ...carried, field_found: true, value: fields[field_name] };
}
