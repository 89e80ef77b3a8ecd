// examples/run-state-lookup-sqlite.ts
import {
  SqliteEntityLogStore,
  StateLookupRegistry,
  createStateLookup,
} from "../packages/history/src/index.js";

// ---- assert helper ----
function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

type Invoice = { id: number; number: string };

async function main() {
  const store = new SqliteEntityLogStore(":memory:");

  // what the write path would record on each save
  await store.appendEntry({
    entity_type: "invoice",
    object_pk: "1",
    object_repr: "INV-0001",
    action: "create",
    timestamp: "2025-01-01T09:00:00Z",
    serialized_data: { fields: { status: "draft", total: 100 } },
  });
  await store.appendEntry({
    entity_type: "invoice",
    object_pk: "1",
    object_repr: "INV-0001",
    timestamp: "2025-01-02T09:00:00Z",
    serialized_data: { fields: { status: "sent", total: 120 } },
  });
  await store.appendEntry({
    entity_type: "invoice",
    object_pk: "1",
    object_repr: "INV-0001",
    action: "access",
    timestamp: "2025-01-03T09:00:00Z",
    serialized_data: null,
  });

  const registry = new StateLookupRegistry<Invoice>().register(
    "invoice",
    createStateLookup<Invoice>({
      store,
      refFor: (inv) => ({ entity_type: "invoice", object_pk: String(inv.id) }),
    })
  );

  const inv: Invoice = { id: 1, number: "INV-0001" };

  const before = await registry.getObjectStateAtTimestamp("invoice", inv, "2024-12-31T00:00:00Z");
  assert(!before.log_found, "expected no history before creation");

  const day1 = await registry.getFieldStateAtTimestamp("invoice", inv, "status", "2025-01-01T18:00:00Z");
  assert(day1.field_found && day1.value === "draft", "expected draft on day 1");

  const day2 = await registry.getObjectStateAtTimestamp("invoice", inv, "2025-01-02T18:00:00Z");
  assert(day2.log_found && day2.serialized_fields?.total === 120, "expected total 120 on day 2");

  // the access entry carries no payload
  const day3 = await registry.getFieldStateAtTimestamp("invoice", inv, "status", "2025-01-03T18:00:00Z");
  assert(day3.log_found && !day3.field_found, "expected log without fields on day 3");

  const entry = await registry.lookupFor("invoice").fetchLogEntry(day3);
  assert(entry?.action === "access", "expected the access entry");

  console.log(JSON.stringify({ before, day1, day2, day3, entry }, null, 2));
  store.close();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
