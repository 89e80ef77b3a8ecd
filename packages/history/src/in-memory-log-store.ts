import type { AppendLogEntryInput, EntityRef, LogEntry } from "./log-entry.js";
import { parseAppendInput } from "./log-entry.js";
import type { EntityLogStore } from "./log-store.js";
import { compareNewestFirst } from "./log-store.js";

function clone<T>(x: T): T {
  // Entries are plain JSON-safe objects here
  return JSON.parse(JSON.stringify(x)) as T;
}

function refKey(ref: EntityRef): string {
  return JSON.stringify([ref.entity_type, ref.object_pk]);
}

export class InMemoryEntityLogStore implements EntityLogStore {
  private entries = new Map<number, LogEntry>();
  private byEntity = new Map<string, number[]>();
  private nextId = 1;

  async appendEntry(input: AppendLogEntryInput): Promise<LogEntry> {
    const rec: LogEntry = { id: this.nextId++, ...parseAppendInput(input) };

    this.entries.set(rec.id, clone(rec));

    const key = refKey(rec);
    const ids = this.byEntity.get(key) ?? [];
    ids.push(rec.id);
    this.byEntity.set(key, ids);

    return clone(rec);
  }

  async listEntries(ref: EntityRef): Promise<LogEntry[]> {
    const ids = this.byEntity.get(refKey(ref)) ?? [];
    return ids
      .flatMap((id) => {
        const e = this.entries.get(id);
        return e ? [clone(e)] : [];
      })
      .sort((a, b) => compareNewestFirst(b, a));
  }

  async getEntry(id: number): Promise<LogEntry | null> {
    const e = this.entries.get(id);
    return e ? clone(e) : null;
  }
}
