/**
 * Governance Authority
 *
 * Governance VAAs are only accepted from the protocol's governance
 * emitter on Solana. This pair is compiled in, never configured.
 */

import { hexToBytes } from "viem";
import { CHAINS } from "@ibc-gatekeeper/types";
import { bytesEqual } from "./bytes.js";
import type { Attestation, GovernanceAuthority } from "./types.js";

export const GOVERNANCE_AUTHORITY: GovernanceAuthority = Object.freeze({
  chain: CHAINS.Solana,
  address: hexToBytes(
    "0x0000000000000000000000000000000000000000000000000000000000000004",
  ),
});

/**
 * Whether an attestation was emitted by the given authority.
 */
export function isFromAuthority(
  attestation: Pick<Attestation, "emitterChain" | "emitterAddress">,
  authority: GovernanceAuthority = GOVERNANCE_AUTHORITY,
): boolean {
  return (
    attestation.emitterChain === authority.chain &&
    bytesEqual(attestation.emitterAddress, authority.address)
  );
}
