/**
 * @ibc-gatekeeper/state — Core types.
 *
 * Defines the key-value persistence contract contracts run against.
 *
 * Design principles:
 * - Keys are fixed, well-known strings (one slot per singleton)
 * - Values are canonical JSON strings
 * - All access is synchronous; a call never suspends mid-way
 * - Atomicity is explicit: writes are staged, then committed or discarded
 */

// =============================================================================
// Key-Value Store Interface
// =============================================================================

/**
 * Synchronous key-value store.
 *
 * Invariants:
 * - `get` after `set` in the same store returns the written value
 * - `delete` of a missing key is a no-op
 * - Iteration order of `keys` is unspecified
 */
export interface KeyValueStore {
  /**
   * Read the raw value at a key.
   *
   * @returns The value, or undefined if the key has never been written
   */
  get(key: string): string | undefined;

  /** Write (overwrite) the raw value at a key. */
  set(key: string, value: string): void;

  /** Remove a key. */
  delete(key: string): void;

  /** Whether a key holds a value. */
  has(key: string): boolean;

  /** All keys currently holding a value. */
  keys(): readonly string[];
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for state operations.
 */
export type StateErrorCode =
  | "NOT_FOUND"
  | "CORRUPT_VALUE"
  | "TRANSACTION_CLOSED";

/**
 * Error thrown by state operations.
 */
export class StateError extends Error {
  constructor(
    public readonly code: StateErrorCode,
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = "StateError";
  }
}
