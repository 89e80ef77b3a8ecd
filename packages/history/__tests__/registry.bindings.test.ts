import { describe, it, expect } from "vitest";

import { InMemoryEntityLogStore } from "../src/in-memory-log-store.js";
import { StateLookupRegistry } from "../src/registry.js";
import { createStateLookup } from "../src/state-lookup.js";
import { at } from "./_helpers/stores.js";

type Tracked = { id: number; kind: "invoice" | "customer" };

function bind(store: InMemoryEntityLogStore) {
  return createStateLookup<Tracked>({
    store,
    refFor: (entity) => ({ entity_type: entity.kind, object_pk: String(entity.id) }),
  });
}

describe("createStateLookup", () => {
  it("resolves an entity to its own log entries", async () => {
    const store = new InMemoryEntityLogStore();
    await store.appendEntry({
      entity_type: "invoice",
      object_pk: "7",
      object_repr: "Invoice #7",
      timestamp: at(1),
      serialized_data: { fields: { status: "draft" } },
    });
    const sent = await store.appendEntry({
      entity_type: "invoice",
      object_pk: "7",
      timestamp: at(4),
      serialized_data: { fields: { status: "sent" } },
    });
    const lookup = bind(store);

    const field = await lookup.getFieldStateAtTimestamp({ id: 7, kind: "invoice" }, "status", at(6));
    expect(field).toStrictEqual({
      log_found: true,
      field_found: true,
      field_name: "status",
      value: "sent",
      timestamp: at(4),
      log_entry_id: sent.id,
    });

    const other = await lookup.getObjectStateAtTimestamp({ id: 7, kind: "customer" }, at(6));
    expect(other).toStrictEqual({ log_found: false });

    const full = await lookup.fetchLogEntry(field);
    expect(full?.serialized_data).toStrictEqual({ fields: { status: "sent" } });
  });
});

describe("StateLookupRegistry", () => {
  it("delegates to the lookup registered for the entity type", async () => {
    const store = new InMemoryEntityLogStore();
    await store.appendEntry({
      entity_type: "invoice",
      object_pk: "1",
      timestamp: at(1),
      serialized_data: { fields: { total: 120 } },
    });

    const registry = new StateLookupRegistry<Tracked>().register("invoice", bind(store));

    const state = await registry.getFieldStateAtTimestamp("invoice", { id: 1, kind: "invoice" }, "total", at(2));
    expect(state.field_found && state.value).toBe(120);

    const object = await registry.getObjectStateAtTimestamp("invoice", { id: 1, kind: "invoice" }, at(2));
    expect(object.log_found && object.serialized_fields).toStrictEqual({ total: 120 });
  });

  it("throws for an entity type that was never registered", () => {
    const registry = new StateLookupRegistry<Tracked>();

    expect(registry.has("customer")).toBe(false);
    expect(() => registry.lookupFor("customer")).toThrow(
      "No state lookup registered for entity type: customer"
    );
    expect(() =>
      registry.getFieldStateAtTimestamp("customer", { id: 1, kind: "customer" }, "name", at(1))
    ).toThrow("No state lookup registered for entity type: customer");
  });

  it("refuses to register a type twice", () => {
    const store = new InMemoryEntityLogStore();
    const registry = new StateLookupRegistry<Tracked>().register("invoice", bind(store));

    expect(() => registry.register("invoice", bind(store))).toThrow(
      "State lookup already registered for entity type: invoice"
    );
  });

  it("lists registered entity types in order", () => {
    const store = new InMemoryEntityLogStore();
    const registry = new StateLookupRegistry<Tracked>()
      .register("invoice", bind(store))
      .register("customer", bind(store));

    expect(registry.entityTypes()).toStrictEqual(["customer", "invoice"]);
    expect(registry.has("invoice")).toBe(true);
  });
});
