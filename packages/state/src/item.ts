/**
 * @ibc-gatekeeper/state — Typed singleton slot.
 *
 * An Item binds a fixed key to a zod schema. Values are written as
 * canonical JSON (RFC 8785) and validated on every load, so a slot
 * never yields a value its schema would reject.
 */

import { canonicalize } from "json-canonicalize";
import type { z } from "zod";
import type { KeyValueStore } from "./types.js";
import { StateError } from "./types.js";

export class Item<S extends z.ZodTypeAny> {
  constructor(
    readonly key: string,
    private readonly schema: S,
  ) {}

  /**
   * Load the value.
   *
   * @throws StateError NOT_FOUND if the slot is empty
   * @throws StateError CORRUPT_VALUE if the stored value fails its schema
   */
  load(store: KeyValueStore): z.output<S> {
    const value = this.mayLoad(store);
    if (value === undefined) {
      throw new StateError("NOT_FOUND", `No value stored at "${this.key}"`, this.key);
    }
    return value;
  }

  /**
   * Load the value, or undefined if the slot is empty.
   */
  mayLoad(store: KeyValueStore): z.output<S> | undefined {
    const raw = store.get(this.key);
    if (raw === undefined) return undefined;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StateError(
        "CORRUPT_VALUE",
        `Value at "${this.key}" is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        this.key,
      );
    }

    const parsed = this.schema.safeParse(json);
    if (!parsed.success) {
      throw new StateError(
        "CORRUPT_VALUE",
        `Value at "${this.key}" does not match its schema: ${parsed.error.message}`,
        this.key,
      );
    }
    return parsed.data;
  }

  /**
   * Overwrite the value.
   */
  save(store: KeyValueStore, value: z.input<S>): void {
    store.set(this.key, canonicalize(this.schema.parse(value)));
  }

  exists(store: KeyValueStore): boolean {
    return store.has(this.key);
  }
}
