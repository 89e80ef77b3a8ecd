import { afterEach, beforeEach, describe, expect, it } from "vitest";
import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { SqliteEntityLogStore } from "../src/sqlite-log-store.js";
import { getFieldStateAtTimestamp, getObjectStateAtTimestamp } from "../src/state-lookup.js";
import { at } from "./_helpers/stores.js";

const ref = { entity_type: "invoice", object_pk: "42" };

describe("SqliteEntityLogStore", () => {
  it("round-trips entries and answers getEntry", async () => {
    const store = new SqliteEntityLogStore(":memory:");
    const e = await store.appendEntry({
      ...ref,
      object_repr: "Invoice #42",
      action: "create",
      timestamp: "2025-01-01T01:00:00+01:00",
      serialized_data: { fields: { status: "draft", lines: [1, 2] } },
    });

    expect(e).toStrictEqual({
      id: 1,
      ...ref,
      object_repr: "Invoice #42",
      action: "create",
      timestamp: "2025-01-01T00:00:00.000Z",
      serialized_data: { fields: { status: "draft", lines: [1, 2] } },
    });
    expect(await store.getEntry(1)).toStrictEqual(e);
    expect(await store.getEntry(2)).toBeNull();
    store.close();
  });

  it("lists entries oldest first with id as the tie-break", async () => {
    const store = new SqliteEntityLogStore(":memory:");
    await store.appendEntry({ ...ref, timestamp: at(5) });
    await store.appendEntry({ ...ref, timestamp: at(1) });
    await store.appendEntry({ ...ref, timestamp: at(5) });

    expect((await store.listEntries(ref)).map((e) => e.id)).toStrictEqual([2, 1, 3]);
    store.close();
  });

  it("answers the index lookup with the newest entry at or before the target", async () => {
    const store = new SqliteEntityLogStore(":memory:");
    await store.appendEntry({ ...ref, timestamp: at(1) });
    await store.appendEntry({ ...ref, timestamp: at(3) });
    await store.appendEntry({ ...ref, timestamp: at(3) });

    expect((await store.getLatestEntryAtOrBefore(ref, at(2)))?.id).toBe(1);
    expect((await store.getLatestEntryAtOrBefore(ref, at(3)))?.id).toBe(3);
    expect(await store.getLatestEntryAtOrBefore(ref, at(0))).toBeNull();
    store.close();
  });

  describe("on disk", () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "entity-history-"));
      file = path.join(dir, "history.sqlite");
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("treats payload text that is not JSON as a malformed snapshot", async () => {
      const store = new SqliteEntityLogStore(file);
      const e = await store.appendEntry({ ...ref, timestamp: at(1), serialized_data: { fields: { a: 1 } } });
      store.close();

      // a writer outside this library left broken JSON behind
      const raw = new Database(file);
      raw.prepare(`UPDATE log_entries SET serialized_data = ? WHERE id = ?`).run("{fields: broken", e.id);
      raw.close();

      const reopened = new SqliteEntityLogStore(file, { fileMustExist: true });
      expect((await reopened.getEntry(e.id))?.serialized_data).toBe("{fields: broken");
      expect(await getObjectStateAtTimestamp(reopened, ref, at(2))).toStrictEqual({
        log_found: true,
        timestamp: at(1),
        log_entry_id: e.id,
      });
      expect((await getFieldStateAtTimestamp(reopened, ref, "a", at(2))).field_found).toBe(false);
      reopened.close();
    });

    it("opens read-only without migrating and refuses appends", async () => {
      const seeded = new SqliteEntityLogStore(file);
      const e = await seeded.appendEntry({ ...ref, timestamp: at(1), serialized_data: { fields: { a: 1 } } });
      seeded.close();

      const ro = new SqliteEntityLogStore(file, { readonly: true });
      expect((await getFieldStateAtTimestamp(ro, ref, "a", at(2))).field_found).toBe(true);
      expect((await ro.getEntry(e.id))?.id).toBe(e.id);
      await expect(ro.appendEntry({ ...ref, timestamp: at(3) })).rejects.toThrow();
      ro.close();

      expect(() => new SqliteEntityLogStore(path.join(dir, "missing.sqlite"), { readonly: true })).toThrow();
    });

    it("refuses to create a missing file when asked not to", () => {
      expect(() => new SqliteEntityLogStore(path.join(dir, "missing.sqlite"), { fileMustExist: true })).toThrow();
    });
  });
});
