/**
 * @ibc-gatekeeper/types — Shared domain types for the gatekeeper stack.
 *
 * These types are used across all gatekeeper packages:
 * - Chain identifiers
 * - Call context (block, transaction, caller)
 * - Contract responses (attributes and events)
 * - IBC channel views
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Builders return new values; nothing mutates in place
 */

// Chain types
export type { ChainId, ChainName } from "./chain.js";
export { CHAINS, chainName } from "./chain.js";

// Call context
export type { BlockInfo, TransactionInfo, Env, MessageInfo } from "./context.js";

// Responses
export type { Attribute, ContractEvent, ContractResponse } from "./response.js";
export {
  emptyResponse,
  withAttributes,
  withEvent,
  attr,
} from "./response.js";

// IBC
export type { IbcEndpoint, IbcOrder, IbcChannel } from "./ibc.js";
export { WASM_PORT_PREFIX, wasmPortId } from "./ibc.js";

// Runtime type guards
export { isAttribute, isContractEvent, isContractResponse } from "./guards.js";
