/**
 * @ibc-gatekeeper/state — In-memory KeyValueStore implementation.
 *
 * Stores values in a plain Map. Suitable for:
 * - Unit and integration tests
 * - Embedding the contracts in a single process
 *
 * Not durable: all state is lost on process exit.
 */

import type { KeyValueStore } from "./types.js";

export class InMemoryStore implements KeyValueStore {
  private readonly _entries: Map<string, string>;

  constructor(initial?: Iterable<readonly [string, string]>) {
    this._entries = new Map(initial);
  }

  get(key: string): string | undefined {
    return this._entries.get(key);
  }

  set(key: string, value: string): void {
    this._entries.set(key, value);
  }

  delete(key: string): void {
    this._entries.delete(key);
  }

  has(key: string): boolean {
    return this._entries.has(key);
  }

  keys(): readonly string[] {
    return [...this._entries.keys()];
  }

  /**
   * Copy of every entry, for assertions and debugging.
   */
  snapshot(): ReadonlyMap<string, string> {
    return new Map(this._entries);
  }
}
