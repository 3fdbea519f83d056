/**
 * Governance Types
 *
 * Attestations (VAAs), governance packets and the errors raised while
 * authenticating and applying them.
 *
 * Design:
 * - All types are readonly
 * - Byte fields are Uint8Array; 64-bit integers are bigint
 * - Actions are a closed union discriminated by `type`
 */

import type { Hex } from "viem";
import type { ChainId } from "@ibc-gatekeeper/types";

// =============================================================================
// Attestation
// =============================================================================

/**
 * One guardian's signature over the VAA digest.
 */
export interface GuardianSignature {
  /** Position of the signer in the guardian set */
  readonly guardianIndex: number;

  /** 65-byte signature (r || s || v) */
  readonly signature: Uint8Array;
}

/**
 * A parsed, quorum-attested message.
 */
export interface Attestation {
  readonly version: number;
  readonly guardianSetIndex: number;
  readonly signatures: readonly GuardianSignature[];

  /** Seconds since the Unix epoch, as stamped by the emitter */
  readonly timestamp: number;
  readonly nonce: number;

  /** Origin chain of the payload */
  readonly emitterChain: ChainId;

  /** 32-byte origin contract address */
  readonly emitterAddress: Uint8Array;
  readonly sequence: bigint;
  readonly consistencyLevel: number;
  readonly payload: Uint8Array;

  /** keccak256(keccak256(body)), the value guardians sign */
  readonly digest: Hex;
}

/**
 * Turns raw VAA bytes into a trusted attestation, or throws.
 */
export interface AttestationVerifier {
  parseAndVerify(data: Uint8Array, blockTimeSeconds: number): Attestation;
}

// =============================================================================
// Governance Packet
// =============================================================================

export interface RegisterChainAction {
  readonly type: "register_chain";
  /** Chain whose receiver is being registered */
  readonly chain: ChainId;
  /** 32-byte receiver address field */
  readonly emitterAddress: Uint8Array;
}

export interface ContractUpgradeAction {
  readonly type: "contract_upgrade";
  readonly newContract: Uint8Array;
}

export interface RecoverChainIdAction {
  readonly type: "recover_chain_id";
  readonly evmChainId: bigint;
  readonly newChain: ChainId;
}

export type GovernanceAction =
  | RegisterChainAction
  | ContractUpgradeAction
  | RecoverChainIdAction;

/**
 * A governance instruction decoded from an attestation payload.
 */
export interface GovernancePacket {
  /** Governance module name (e.g., "TokenBridge") */
  readonly module: string;

  /** Chain the instruction targets; 0 means any chain */
  readonly targetChain: ChainId;

  readonly action: GovernanceAction;
}

/**
 * The only (chain, address) pair allowed to issue governance.
 */
export interface GovernanceAuthority {
  readonly chain: ChainId;
  readonly address: Uint8Array;
}

// =============================================================================
// Errors
// =============================================================================

export type VaaErrorCode =
  | "MALFORMED"
  | "UNSUPPORTED_VERSION"
  | "GUARDIAN_SET_UNKNOWN"
  | "GUARDIAN_SET_EXPIRED"
  | "NO_QUORUM"
  | "SIGNATURES_UNORDERED"
  | "GUARDIAN_INDEX_OUT_OF_RANGE"
  | "INVALID_SIGNATURE";

/**
 * Raised while parsing or verifying a VAA.
 */
export class VaaError extends Error {
  public readonly code: VaaErrorCode;

  constructor(code: VaaErrorCode, message: string) {
    super(message);
    this.name = "VaaError";
    this.code = code;
  }
}

export type GovernanceErrorCode =
  | "ATTESTATION_INVALID"
  | "UNTRUSTED_EMITTER"
  | "PAYLOAD_DECODE_ERROR"
  | "WRONG_TARGET_CHAIN"
  | "WRONG_CHAIN_REGISTRATION"
  | "ADDRESS_DECODE_ERROR"
  | "UNSUPPORTED_GOVERNANCE_ACTION";

/**
 * Raised when a governance VAA is rejected.
 * Always thrown; a rejected VAA never changes state.
 */
export class GovernanceError extends Error {
  public readonly code: GovernanceErrorCode;

  constructor(code: GovernanceErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GovernanceError";
    this.code = code;
  }
}
