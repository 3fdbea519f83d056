/**
 * Core Bridge
 *
 * The messaging core the gateway fronts. The gateway never interprets
 * core messages beyond choosing which ones to relay; everything else is
 * delegated as-is.
 */

import type { ChainId, ContractResponse, Env, MessageInfo } from "@ibc-gatekeeper/types";
import type { KeyValueStore } from "@ibc-gatekeeper/state";
import type { GuardianSet } from "@ibc-gatekeeper/governance";

// =============================================================================
// Context
// =============================================================================

export interface MigrateContext {
  /** Staged view of contract state; writes commit with the call */
  readonly store: KeyValueStore;
  readonly env: Env;
}

export interface CallContext extends MigrateContext {
  readonly info: MessageInfo;
}

// =============================================================================
// Messages
// =============================================================================

export interface CoreInstantiateMsg {
  /** Chain of the governance emitter */
  readonly govChain: ChainId;
  readonly govAddress: Uint8Array;
  readonly initialGuardianSet: GuardianSet;
  /** Seconds a replaced guardian set stays valid */
  readonly guardianSetExpiry: number;
  /** Chain identifier of the host chain */
  readonly chainId: ChainId;
  readonly feeDenom: string;
}

export interface SubmitVaaMsg {
  readonly type: "submit_vaa";
  readonly vaa: Uint8Array;
}

export interface PostMessageMsg {
  readonly type: "post_message";
  readonly message: Uint8Array;
  readonly nonce: number;
}

export type CoreExecuteMsg = SubmitVaaMsg | PostMessageMsg;

// =============================================================================
// Bridge
// =============================================================================

/**
 * Entry points of the messaging core. Implementations throw on failure.
 */
export interface CoreBridge {
  instantiate(ctx: CallContext, msg: CoreInstantiateMsg): ContractResponse;
  execute(ctx: CallContext, msg: CoreExecuteMsg): ContractResponse;
  migrate(ctx: MigrateContext): ContractResponse;
}
