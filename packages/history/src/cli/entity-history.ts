#!/usr/bin/env node
// packages/history/src/cli/entity-history.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";
import { pathToFileURL } from "node:url";

import { z } from "zod";

import type { EntityRef } from "../log-entry.js";
import { AppendLogEntrySchema, normalizeTimestamp } from "../log-entry.js";
import { SqliteEntityLogStore } from "../sqlite-log-store.js";
import { getFieldStateAtTimestamp, getObjectStateAtTimestamp } from "../state-lookup.js";

export type CliIo = {
  out: (text: string) => void;
  err: (line: string) => void;
};

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (line) => console.error(line),
};

class UsageError extends Error {}

function usage(): string {
  return `entity-history - point-in-time lookups over an entity log database

Usage:
  entity-history --help
  entity-history version

  entity-history state   --db <path> --type <entity_type> --pk <object_pk> --at <iso>
  entity-history field   --db <path> --type <entity_type> --pk <object_pk> --field <name> --at <iso>
  entity-history entry   --db <path> --id <log_entry_id>
  entity-history entries --db <path> --type <entity_type> --pk <object_pk>
  entity-history append  --db <path> <entry.json>

Examples:
  entity-history state --db ./history.sqlite --type invoice --pk 42 --at 2025-01-01T12:00:00Z
  entity-history field --db ./history.sqlite --type invoice --pk 42 --field status --at 2025-01-01T12:00:00Z
  entity-history append --db ./history.sqlite entry.json
`;
}

// -------------------- argv parsing --------------------

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function requireFlag(args: string[], flag: string, label: string): string {
  const v = getFlagValue(args, flag);
  if (!v) throw new UsageError(`Missing ${flag} <${label}>`);
  return v;
}

function requireRef(args: string[]): EntityRef {
  return {
    entity_type: requireFlag(args, "--type", "entity_type"),
    object_pk: requireFlag(args, "--pk", "object_pk"),
  };
}

function requireTimestamp(args: string[]): string {
  const at = requireFlag(args, "--at", "iso");
  if (Number.isNaN(Date.parse(at))) throw new UsageError(`Invalid --at timestamp: ${at}`);
  return normalizeTimestamp(at);
}

function requireId(args: string[]): number {
  const raw = requireFlag(args, "--id", "log_entry_id");
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) throw new UsageError(`Invalid --id: ${raw}`);
  return id;
}

// -------------------- file helpers --------------------

function readJsonFile(filePath: string): unknown {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) throw new UsageError(`file not found: ${filePath}`);
  const raw = fs.readFileSync(abs, "utf8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new UsageError(`"${filePath}" is not valid JSON.`);
  }
}

function jsonPretty(obj: unknown): string {
  return JSON.stringify(obj, null, 2) + "\n";
}

// -------------------- commands --------------------

async function withStore<T>(
  dbPath: string,
  readonly: boolean,
  fn: (store: SqliteEntityLogStore) => Promise<T>
): Promise<T> {
  // reads never touch the file; append creates and migrates it
  const store = new SqliteEntityLogStore(dbPath, { readonly });
  try {
    return await fn(store);
  } finally {
    store.close();
  }
}

const COMMANDS = ["state", "field", "entry", "entries", "append"];

async function runCommand(cmd: string, args: string[], io: CliIo): Promise<number> {
  if (!COMMANDS.includes(cmd)) throw new UsageError(`Unknown command: ${cmd}`);

  const dbPath = requireFlag(args, "--db", "path");

  if (cmd === "state") {
    const ref = requireRef(args);
    const at = requireTimestamp(args);
    const state = await withStore(dbPath, true, (store) => getObjectStateAtTimestamp(store, ref, at));
    io.out(jsonPretty(state));
    return 0;
  }

  if (cmd === "field") {
    const ref = requireRef(args);
    const field = requireFlag(args, "--field", "name");
    const at = requireTimestamp(args);
    const state = await withStore(dbPath, true, (store) =>
      getFieldStateAtTimestamp(store, ref, field, at)
    );
    io.out(jsonPretty(state));
    return 0;
  }

  if (cmd === "entry") {
    const id = requireId(args);
    const entry = await withStore(dbPath, true, (store) => store.getEntry(id));
    if (!entry) {
      io.err(`[entity-history] log entry not found: ${id}`);
      return 1;
    }
    io.out(jsonPretty(entry));
    return 0;
  }

  if (cmd === "entries") {
    const ref = requireRef(args);
    const entries = await withStore(dbPath, true, (store) => store.listEntries(ref));
    io.out(jsonPretty(entries));
    return 0;
  }

  if (cmd === "append") {
    const file = args.find((a, i) => i > 0 && !a.startsWith("--") && args[i - 1] !== "--db");
    if (!file) throw new UsageError("Missing file.");
    const input = readJsonFile(file);
    const entry = await withStore(dbPath, false, (store) =>
      store.appendEntry(AppendLogEntrySchema.parse(input))
    );
    io.out(jsonPretty(entry));
    return 0;
  }

  throw new UsageError(`Unknown command: ${cmd}`);
}

export async function run(argv: string[] = process.argv, io: CliIo = defaultIo): Promise<number> {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return 0;
  }

  const cmd = args[0] ?? "";

  if (cmd === "version") {
    io.out("entity-history cli v1\n");
    return 0;
  }

  try {
    return await runCommand(cmd, args, io);
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(`[entity-history] ${e.message}\n`);
      io.err(usage());
      return 1;
    }
    if (e instanceof z.ZodError) {
      io.err(`[entity-history] invalid log entry:\n${z.prettifyError(e)}`);
      return 1;
    }
    const msg = e instanceof Error ? e.message : String(e);
    io.err(`[entity-history] ${msg}`);
    return 1;
  }
}

// Entrypoint: only when executed directly (node/tsx), not when imported
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  run()
    .then((code) => process.exit(code))
    .catch((e) => {
      console.error(e);
      process.exit(1);
    });
}
