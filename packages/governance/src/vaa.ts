/**
 * VAA Wire Codec
 *
 * Layout (big-endian):
 *
 *   header: version u8 | guardianSetIndex u32 | sigCount u8
 *           | sigCount x (guardianIndex u8, signature [65])
 *   body:   timestamp u32 | nonce u32 | emitterChain u16
 *           | emitterAddress [32] | sequence u64 | consistencyLevel u8
 *           | payload [..]
 *
 * Guardians sign keccak256(keccak256(body)).
 */

import { concatBytes, keccak256, numberToBytes } from "viem";
import type { Hex } from "viem";
import type { ChainId } from "@ibc-gatekeeper/types";
import { ByteReader } from "./bytes.js";
import type { Attestation, GuardianSignature } from "./types.js";
import { VaaError } from "./types.js";

export const VAA_VERSION = 1;
export const SIGNATURE_LENGTH = 65;
export const EMITTER_ADDRESS_LENGTH = 32;

/**
 * Digest guardians sign for a given body.
 */
export function vaaDigest(body: Uint8Array): Hex {
  return keccak256(keccak256(body, "bytes"));
}

/**
 * Parse VAA bytes. Performs no signature or guardian-set checks.
 *
 * @throws VaaError MALFORMED on truncated or inconsistent input
 * @throws VaaError UNSUPPORTED_VERSION if the version byte is not 1
 */
export function parseVaa(data: Uint8Array): Attestation {
  const reader = new ByteReader(data);

  try {
    const version = reader.u8("version");
    if (version !== VAA_VERSION) {
      throw new VaaError(
        "UNSUPPORTED_VERSION",
        `Unsupported VAA version ${version}, expected ${VAA_VERSION}`,
      );
    }

    const guardianSetIndex = reader.u32("guardian set index");
    const sigCount = reader.u8("signature count");
    const signatures: GuardianSignature[] = [];
    for (let i = 0; i < sigCount; i++) {
      signatures.push({
        guardianIndex: reader.u8(`signature ${i} guardian index`),
        signature: reader.bytes(SIGNATURE_LENGTH, `signature ${i}`),
      });
    }

    const body = data.slice(reader.position);

    return {
      version,
      guardianSetIndex,
      signatures,
      timestamp: reader.u32("timestamp"),
      nonce: reader.u32("nonce"),
      emitterChain: reader.u16("emitter chain"),
      emitterAddress: reader.bytes(EMITTER_ADDRESS_LENGTH, "emitter address"),
      sequence: reader.u64("sequence"),
      consistencyLevel: reader.u8("consistency level"),
      payload: reader.rest(),
      digest: vaaDigest(body),
    };
  } catch (err) {
    if (err instanceof VaaError) throw err;
    throw new VaaError(
      "MALFORMED",
      `Malformed VAA: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Fields of a VAA body.
 */
export interface VaaBody {
  readonly timestamp: number;
  readonly nonce: number;
  readonly emitterChain: ChainId;
  readonly emitterAddress: Uint8Array;
  readonly sequence: bigint;
  readonly consistencyLevel: number;
  readonly payload: Uint8Array;
}

export function encodeVaaBody(body: VaaBody): Uint8Array {
  if (body.emitterAddress.length !== EMITTER_ADDRESS_LENGTH) {
    throw new VaaError(
      "MALFORMED",
      `Emitter address must be ${EMITTER_ADDRESS_LENGTH} bytes, got ${body.emitterAddress.length}`,
    );
  }

  return concatBytes([
    numberToBytes(body.timestamp, { size: 4 }),
    numberToBytes(body.nonce, { size: 4 }),
    numberToBytes(body.emitterChain, { size: 2 }),
    body.emitterAddress,
    numberToBytes(body.sequence, { size: 8 }),
    numberToBytes(body.consistencyLevel, { size: 1 }),
    body.payload,
  ]);
}

/**
 * Serialize a VAA from an already-encoded body and its signatures.
 */
export function encodeVaa(
  guardianSetIndex: number,
  signatures: readonly GuardianSignature[],
  body: Uint8Array,
): Uint8Array {
  const parts: Uint8Array[] = [
    numberToBytes(VAA_VERSION, { size: 1 }),
    numberToBytes(guardianSetIndex, { size: 4 }),
    numberToBytes(signatures.length, { size: 1 }),
  ];

  for (const sig of signatures) {
    if (sig.signature.length !== SIGNATURE_LENGTH) {
      throw new VaaError(
        "MALFORMED",
        `Signature for guardian ${sig.guardianIndex} must be ${SIGNATURE_LENGTH} bytes`,
      );
    }
    parts.push(numberToBytes(sig.guardianIndex, { size: 1 }), sig.signature);
  }

  parts.push(body);
  return concatBytes(parts);
}
