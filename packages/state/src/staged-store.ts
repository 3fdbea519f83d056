/**
 * @ibc-gatekeeper/state — Staged (transactional) store.
 *
 * Overlays a base store with a write buffer. Reads see staged writes
 * first, then the base. Nothing reaches the base until `commit()`.
 *
 * One StagedStore is one call: after commit or discard it is closed and
 * every further access throws TRANSACTION_CLOSED.
 */

import type { KeyValueStore } from "./types.js";
import { StateError } from "./types.js";

/** Staged deletion marker */
const DELETED = null;

export class StagedStore implements KeyValueStore {
  /** Pending writes; null marks a staged delete */
  private readonly _pending = new Map<string, string | typeof DELETED>();

  private _closed = false;

  constructor(private readonly base: KeyValueStore) {}

  get(key: string): string | undefined {
    this._assertOpen();
    const staged = this._pending.get(key);
    if (staged === DELETED) return undefined;
    if (staged !== undefined) return staged;
    return this.base.get(key);
  }

  set(key: string, value: string): void {
    this._assertOpen();
    this._pending.set(key, value);
  }

  delete(key: string): void {
    this._assertOpen();
    this._pending.set(key, DELETED);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  keys(): readonly string[] {
    this._assertOpen();
    const keys = new Set(this.base.keys());
    for (const [key, value] of this._pending) {
      if (value === DELETED) {
        keys.delete(key);
      } else {
        keys.add(key);
      }
    }
    return [...keys];
  }

  /** Number of keys with a staged write or delete. */
  get pendingCount(): number {
    return this._pending.size;
  }

  /**
   * Apply every staged write to the base store, in write order.
   */
  commit(): void {
    this._assertOpen();
    for (const [key, value] of this._pending) {
      if (value === DELETED) {
        this.base.delete(key);
      } else {
        this.base.set(key, value);
      }
    }
    this._pending.clear();
    this._closed = true;
  }

  /**
   * Drop every staged write. The base store is untouched.
   */
  discard(): void {
    this._pending.clear();
    this._closed = true;
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new StateError(
        "TRANSACTION_CLOSED",
        "Staged store has already been committed or discarded",
      );
    }
  }
}

/**
 * Run `fn` against a staged view of `store`.
 *
 * Commits when `fn` returns; discards and rethrows when it throws.
 * Writes made by `fn` are therefore visible only if the whole call succeeds.
 */
export function withTransaction<T>(
  store: KeyValueStore,
  fn: (tx: KeyValueStore) => T,
): T {
  const tx = new StagedStore(store);
  let result: T;
  try {
    result = fn(tx);
  } catch (err) {
    tx.discard();
    throw err;
  }
  tx.commit();
  return result;
}
