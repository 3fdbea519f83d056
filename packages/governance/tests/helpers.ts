/**
 * Test helpers for @ibc-gatekeeper/governance.
 *
 * Builds VAAs signed by a deterministic stand-in signature scheme:
 * a guardian's "signature" is its key followed by the digest it signs.
 */

import { concatBytes, hexToBytes, stringToBytes } from "viem";
import type { ChainId, Env, MessageInfo } from "@ibc-gatekeeper/types";
import { CHAINS } from "@ibc-gatekeeper/types";
import { GOVERNANCE_AUTHORITY } from "../src/authority.js";
import { encodeGovernancePacket, TOKEN_BRIDGE_MODULE } from "../src/governance-packet.js";
import { GuardianSetVerifier } from "../src/guardian-set.js";
import type { GuardianSet, SignatureScheme } from "../src/guardian-set.js";
import type { GovernanceAction } from "../src/types.js";
import { encodeVaa, encodeVaaBody, vaaDigest } from "../src/vaa.js";

export const BLOCK_TIME = 1_700_000_000;

export function guardianKey(index: number): Uint8Array {
  return new Uint8Array(20).fill(index + 1);
}

export function sign(index: number, digest: Uint8Array): Uint8Array {
  return concatBytes([guardianKey(index), digest, new Uint8Array(13)]);
}

export const testScheme: SignatureScheme = {
  verify(digest, signature, key) {
    const expected = concatBytes([key, digest, new Uint8Array(13)]);
    return (
      signature.length === expected.length &&
      signature.every((b, i) => b === expected[i])
    );
  },
};

export function makeGuardianSet(
  size: number,
  index = 0,
  expirationTime = 0,
): GuardianSet {
  return {
    index,
    keys: Array.from({ length: size }, (_, i) => guardianKey(i)),
    expirationTime,
  };
}

export function makeVerifier(sets: readonly GuardianSet[] = [makeGuardianSet(1)]): GuardianSetVerifier {
  return new GuardianSetVerifier({ guardianSets: sets, scheme: testScheme });
}

export interface VaaOptions {
  readonly emitterChain?: ChainId;
  readonly emitterAddress?: Uint8Array;
  readonly payload: Uint8Array;
  readonly guardianSetIndex?: number;
  readonly signers?: readonly number[];
  readonly sequence?: bigint;
}

/**
 * Build signed VAA bytes. Defaults to the governance emitter and one signer.
 */
export function buildVaa(options: VaaOptions): Uint8Array {
  const body = encodeVaaBody({
    timestamp: BLOCK_TIME - 60,
    nonce: 0,
    emitterChain: options.emitterChain ?? GOVERNANCE_AUTHORITY.chain,
    emitterAddress: options.emitterAddress ?? GOVERNANCE_AUTHORITY.address,
    sequence: options.sequence ?? 1n,
    consistencyLevel: 32,
    payload: options.payload,
  });
  const digest = hexToBytes(vaaDigest(body));
  const signatures = (options.signers ?? [0]).map((i) => ({
    guardianIndex: i,
    signature: sign(i, digest),
  }));
  return encodeVaa(options.guardianSetIndex ?? 0, signatures, body);
}

export function governancePayload(
  action: GovernanceAction,
  targetChain: ChainId = CHAINS.Any,
): Uint8Array {
  return encodeGovernancePacket({ module: TOKEN_BRIDGE_MODULE, targetChain, action });
}

/**
 * Payload registering `address` (UTF-8) as the receiver on `chain`.
 */
export function registerChainPayload(
  address: string | Uint8Array,
  chain: ChainId = CHAINS.Wormchain,
  targetChain: ChainId = CHAINS.Any,
): Uint8Array {
  return governancePayload(
    {
      type: "register_chain",
      chain,
      emitterAddress: typeof address === "string" ? stringToBytes(address) : address,
    },
    targetChain,
  );
}

export function mockEnv(overrides: Partial<Env["block"]> = {}): Env {
  return {
    block: {
      height: 12_345,
      timeSeconds: BLOCK_TIME,
      chainId: "gatekeeper-test-1",
      ...overrides,
    },
    transaction: { index: 3 },
    contractAddress: "contract0",
  };
}

export const CREATOR: MessageInfo = { sender: "creator" };
