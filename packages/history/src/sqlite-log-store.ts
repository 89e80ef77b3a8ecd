// packages/history/src/sqlite-log-store.ts
import Database from "better-sqlite3";
import type { AppendLogEntryInput, EntityRef, LogAction, LogEntry } from "./log-entry.js";
import { parseAppendInput } from "./log-entry.js";
import type { EntityLogStore } from "./log-store.js";

type LogEntryRow = {
  id: number;
  entity_type: string;
  object_pk: string;
  object_repr: string;
  action: LogAction;
  timestamp: string;
  serialized_data: string | null;
};

export type SqliteEntityLogStoreOptions = {
  // refuse to create a new database file
  fileMustExist?: boolean;

  // open an existing file read-only: no pragma, no migration, appends fail
  readonly?: boolean;
};

const SELECT_COLUMNS = `id, entity_type, object_pk, object_repr, action, timestamp, serialized_data`;

function parseSerializedData(raw: string | null): unknown {
  if (raw === null) return null;
  try {
    return JSON.parse(raw);
  } catch {
    // not JSON: hand back the raw text, the lookup treats it as malformed
    return raw;
  }
}

function rowToEntry(r: LogEntryRow): LogEntry {
  return {
    id: r.id,
    entity_type: r.entity_type,
    object_pk: r.object_pk,
    object_repr: r.object_repr,
    action: r.action,
    timestamp: r.timestamp,
    serialized_data: parseSerializedData(r.serialized_data),
  };
}

export class SqliteEntityLogStore implements EntityLogStore {
  private db: Database.Database;

  constructor(filename = "entity-history.sqlite", opts: SqliteEntityLogStoreOptions = {}) {
    if (opts.readonly) {
      this.db = new Database(filename, { readonly: true, fileMustExist: true });
      return;
    }

    this.db = new Database(filename, { fileMustExist: opts.fileMustExist ?? false });
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS log_entries (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        entity_type     TEXT NOT NULL,
        object_pk       TEXT NOT NULL,
        object_repr     TEXT NOT NULL DEFAULT '',
        action          TEXT NOT NULL,
        timestamp       TEXT NOT NULL,    -- ISO, toISOString form
        timestamp_ms    INTEGER NOT NULL, -- epoch ms, used for ordering
        serialized_data TEXT           -- JSON, may be NULL
      );

      CREATE INDEX IF NOT EXISTS idx_log_entries_entity_ts
        ON log_entries(entity_type, object_pk, timestamp_ms DESC, id DESC);
    `);
  }

  close(): void {
    this.db.close();
  }

  // ---------------- writes ----------------

  async appendEntry(input: AppendLogEntryInput): Promise<LogEntry> {
    const rec = parseAppendInput(input);

    const info = this.db
      .prepare(
        `INSERT INTO log_entries(entity_type, object_pk, object_repr, action, timestamp, timestamp_ms, serialized_data)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        rec.entity_type,
        rec.object_pk,
        rec.object_repr,
        rec.action,
        rec.timestamp,
        Date.parse(rec.timestamp),
        rec.serialized_data === null ? null : JSON.stringify(rec.serialized_data)
      );

    return { id: Number(info.lastInsertRowid), ...rec };
  }

  // ---------------- reads ----------------

  async listEntries(ref: EntityRef): Promise<LogEntry[]> {
    const rows = this.db
      .prepare(
        `SELECT ${SELECT_COLUMNS}
         FROM log_entries
         WHERE entity_type = ? AND object_pk = ?
         ORDER BY timestamp_ms ASC, id ASC`
      )
      .all(ref.entity_type, ref.object_pk) as LogEntryRow[];

    return rows.map(rowToEntry);
  }

  // ✅ index scan instead of listEntries + sort
  async getLatestEntryAtOrBefore(ref: EntityRef, at: string): Promise<LogEntry | null> {
    const row = this.db
      .prepare(
        `SELECT ${SELECT_COLUMNS}
         FROM log_entries
         WHERE entity_type = ? AND object_pk = ? AND timestamp_ms <= ?
         ORDER BY timestamp_ms DESC, id DESC
         LIMIT 1`
      )
      .get(ref.entity_type, ref.object_pk, Date.parse(at)) as LogEntryRow | undefined;

    return row ? rowToEntry(row) : null;
  }

  async getEntry(id: number): Promise<LogEntry | null> {
    const row = this.db
      .prepare(
        `SELECT ${SELECT_COLUMNS}
         FROM log_entries
         WHERE id = ?
         LIMIT 1`
      )
      .get(id) as LogEntryRow | undefined;

    return row ? rowToEntry(row) : null;
  }
}
