/**
 * @ibc-gatekeeper/state — Key-value persistence for gatekeeper contracts.
 *
 * Provides:
 * - KeyValueStore interface and an in-memory implementation
 * - StagedStore / withTransaction for all-or-nothing calls
 * - Item: a fixed-key slot validated by a zod schema
 * - The contract name/version record used by migrations
 */

// Types
export type { KeyValueStore, StateErrorCode } from "./types.js";
export { StateError } from "./types.js";

// Implementations
export { InMemoryStore } from "./in-memory-store.js";
export { StagedStore, withTransaction } from "./staged-store.js";

// Typed slots
export { Item } from "./item.js";
export {
  ContractVersionSchema,
  CONTRACT_VERSION_KEY,
  getContractVersion,
  setContractVersion,
} from "./contract-version.js";
export type { ContractVersion } from "./contract-version.js";
