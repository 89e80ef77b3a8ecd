// packages/history/src/log-store.ts
import type { AppendLogEntryInput, EntityRef, LogEntry } from "./log-entry.js";

/**
 * EntityLogStore contract
 * - Entries are append-only and immutable once written.
 * - The lookup engine only reads; `appendEntry` exists for writers.
 */
export type EntityLogStore = {
  // -------- writes --------
  appendEntry(input: AppendLogEntryInput): Promise<LogEntry>;

  // -------- reads --------
  listEntries(ref: EntityRef): Promise<LogEntry[]>; // every entry of the entity, oldest first
  getEntry(id: number): Promise<LogEntry | null>;

  /**
   * Optional index-backed lookup: newest entry with timestamp <= at
   * (ties broken by higher id). If not provided, the engine falls back to
   * listEntries + filter + sort.
   */
  getLatestEntryAtOrBefore?(ref: EntityRef, at: string): Promise<LogEntry | null>;
};

type AtOrBeforeCapable = EntityLogStore & {
  getLatestEntryAtOrBefore: (ref: EntityRef, at: string) => Promise<LogEntry | null>;
};

function hasGetLatestEntryAtOrBefore(store: EntityLogStore): store is AtOrBeforeCapable {
  return typeof store.getLatestEntryAtOrBefore === "function";
}

/**
 * Newest first; equal timestamps resolve to the later-written (higher id) entry.
 */
export function compareNewestFirst(a: LogEntry, b: LogEntry): number {
  const dt = Date.parse(b.timestamp) - Date.parse(a.timestamp);
  return dt !== 0 ? dt : b.id - a.id;
}

export function selectLatestAtOrBefore(entries: LogEntry[], at: string): LogEntry | null {
  const target = Date.parse(at);
  const candidates = entries.filter((e) => Date.parse(e.timestamp) <= target);
  candidates.sort(compareNewestFirst);
  return candidates[0] ?? null;
}

export async function findEntryAtOrBefore(
  store: EntityLogStore,
  ref: EntityRef,
  at: string
): Promise<LogEntry | null> {
  if (hasGetLatestEntryAtOrBefore(store)) {
    return store.getLatestEntryAtOrBefore(ref, at);
  }
  return selectLatestAtOrBefore(await store.listEntries(ref), at);
}
