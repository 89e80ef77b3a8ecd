// packages/history/src/registry.ts
import type { TimestampInput } from "./log-entry.js";
import type { FieldState, ObjectState } from "./state.js";
import type { StateLookup } from "./state-lookup.js";

/**
 * Maps entity type names to their bound lookups.
 * Asking for a type nobody registered is a wiring bug, so it throws.
 */
export class StateLookupRegistry<E = unknown> {
  private lookups = new Map<string, StateLookup<E>>();

  register(entity_type: string, lookup: StateLookup<E>): this {
    if (this.lookups.has(entity_type)) {
      throw new Error(`State lookup already registered for entity type: ${entity_type}`);
    }
    this.lookups.set(entity_type, lookup);
    return this;
  }

  has(entity_type: string): boolean {
    return this.lookups.has(entity_type);
  }

  entityTypes(): string[] {
    return [...this.lookups.keys()].sort();
  }

  lookupFor(entity_type: string): StateLookup<E> {
    const lookup = this.lookups.get(entity_type);
    if (!lookup) {
      throw new Error(`No state lookup registered for entity type: ${entity_type}`);
    }
    return lookup;
  }

  getObjectStateAtTimestamp(entity_type: string, entity: E, at: TimestampInput): Promise<ObjectState> {
    return this.lookupFor(entity_type).getObjectStateAtTimestamp(entity, at);
  }

  getFieldStateAtTimestamp(
    entity_type: string,
    entity: E,
    field_name: string,
    at: TimestampInput
  ): Promise<FieldState> {
    return this.lookupFor(entity_type).getFieldStateAtTimestamp(entity, field_name, at);
  }
}
