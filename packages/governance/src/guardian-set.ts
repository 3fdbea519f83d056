/**
 * Guardian Set Verifier
 *
 * Checks a parsed VAA against a known guardian set:
 * 1. The guardian set exists and has not expired at block time
 * 2. Enough signatures for quorum are present
 * 3. Signatures are strictly ascending by guardian index
 * 4. Every signature verifies against its guardian's key
 *
 * The signature scheme itself is injected; this module only enforces
 * the quorum rules around it.
 */

import { hexToBytes } from "viem";
import type { Attestation, AttestationVerifier } from "./types.js";
import { VaaError } from "./types.js";
import { parseVaa } from "./vaa.js";

// =============================================================================
// Types
// =============================================================================

export interface GuardianSet {
  readonly index: number;

  /** Guardian public key identifiers, in guardian-index order */
  readonly keys: readonly Uint8Array[];

  /** Seconds since epoch after which the set is invalid; 0 = never */
  readonly expirationTime: number;
}

/**
 * Verifies one guardian signature over a digest.
 */
export interface SignatureScheme {
  verify(digest: Uint8Array, signature: Uint8Array, guardianKey: Uint8Array): boolean;
}

export interface GuardianSetVerifierConfig {
  readonly guardianSets: readonly GuardianSet[];
  readonly scheme: SignatureScheme;
}

// =============================================================================
// Quorum
// =============================================================================

/**
 * Signatures required from a set of `guardianCount` guardians:
 * strictly more than two thirds.
 */
export function quorum(guardianCount: number): number {
  return Math.floor((guardianCount * 2) / 3) + 1;
}

// =============================================================================
// Verifier
// =============================================================================

export class GuardianSetVerifier implements AttestationVerifier {
  private readonly sets: ReadonlyMap<number, GuardianSet>;
  private readonly scheme: SignatureScheme;

  constructor(config: GuardianSetVerifierConfig) {
    this.sets = new Map<number, GuardianSet>(config.guardianSets.map((s) => [s.index, s]));
    this.scheme = config.scheme;
  }

  /**
   * @throws VaaError on any parse or verification failure
   */
  parseAndVerify(data: Uint8Array, blockTimeSeconds: number): Attestation {
    const vaa = parseVaa(data);

    const set = this.sets.get(vaa.guardianSetIndex);
    if (set === undefined) {
      throw new VaaError(
        "GUARDIAN_SET_UNKNOWN",
        `Unknown guardian set ${vaa.guardianSetIndex}`,
      );
    }
    if (set.expirationTime !== 0 && set.expirationTime < blockTimeSeconds) {
      throw new VaaError(
        "GUARDIAN_SET_EXPIRED",
        `Guardian set ${set.index} expired at ${set.expirationTime}`,
      );
    }

    const required = quorum(set.keys.length);
    if (vaa.signatures.length < required) {
      throw new VaaError(
        "NO_QUORUM",
        `Quorum not met: ${vaa.signatures.length} of ${required} required signatures`,
      );
    }

    const digest = hexToBytes(vaa.digest);
    let lastIndex = -1;
    for (const sig of vaa.signatures) {
      if (sig.guardianIndex <= lastIndex) {
        throw new VaaError(
          "SIGNATURES_UNORDERED",
          `Guardian index ${sig.guardianIndex} follows ${lastIndex}; signatures must be strictly ascending`,
        );
      }
      lastIndex = sig.guardianIndex;

      const key = set.keys[sig.guardianIndex];
      if (key === undefined) {
        throw new VaaError(
          "GUARDIAN_INDEX_OUT_OF_RANGE",
          `Guardian index ${sig.guardianIndex} is outside set ${set.index} (${set.keys.length} guardians)`,
        );
      }
      if (!this.scheme.verify(digest, sig.signature, key)) {
        throw new VaaError(
          "INVALID_SIGNATURE",
          `Signature from guardian ${sig.guardianIndex} does not verify`,
        );
      }
    }

    return vaa;
  }
}
