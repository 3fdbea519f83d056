/**
 * Publish packet codec.
 *
 * Packets are canonical JSON (RFC 8785) encoded as UTF-8, so both ends
 * agree on the bytes of a given response.
 */

import { canonicalize } from "json-canonicalize";
import type { ContractResponse } from "@ibc-gatekeeper/types";
import { isContractResponse } from "@ibc-gatekeeper/types";
import { GatewayError } from "./errors.js";

export interface PublishPacket {
  readonly publish: {
    readonly msg: ContractResponse;
  };
}

export function encodePublishPacket(msg: ContractResponse): Uint8Array {
  const packet: PublishPacket = { publish: { msg } };
  return new TextEncoder().encode(canonicalize(packet));
}

/**
 * @throws GatewayError PACKET_DECODE_ERROR
 */
export function decodePublishPacket(data: Uint8Array): PublishPacket {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(data));
  } catch (err) {
    throw new GatewayError(
      "PACKET_DECODE_ERROR",
      `Packet is not UTF-8 JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("publish" in parsed) ||
    typeof parsed.publish !== "object" ||
    parsed.publish === null ||
    !("msg" in parsed.publish) ||
    !isContractResponse(parsed.publish.msg)
  ) {
    throw new GatewayError(
      "PACKET_DECODE_ERROR",
      "Packet is not a publish message",
    );
  }

  return { publish: { msg: parsed.publish.msg } };
}
