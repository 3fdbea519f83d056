/**
 * Test helpers for @ibc-gatekeeper/gateway.
 *
 * In-process stand-ins for the host: a core bridge that writes to the
 * store, a scripted channel directory and a recording transport.
 */

import { bytesToHex, stringToBytes } from "viem";
import type {
  ChainId,
  ContractResponse,
  Env,
  IbcChannel,
  MessageInfo,
} from "@ibc-gatekeeper/types";
import { CHAINS, attr, emptyResponse, withAttributes, wasmPortId } from "@ibc-gatekeeper/types";
import {
  GOVERNANCE_AUTHORITY,
  GuardianSetVerifier,
  SIGNATURE_LENGTH,
  TOKEN_BRIDGE_MODULE,
  encodeGovernancePacket,
  encodeVaa,
  encodeVaaBody,
} from "@ibc-gatekeeper/governance";
import type { CallContext, CoreBridge, CoreExecuteMsg, CoreInstantiateMsg } from "../src/core-bridge.js";
import type { ChannelDirectory, IbcTransport, OutboundPacket, PacketReceipt } from "../src/relay.js";

export const BLOCK_TIME = 1_700_000_000;
export const CREATOR: MessageInfo = { sender: "creator" };

/** `txIndex: null` for a call outside any transaction */
export function mockEnv(txIndex: number | null = 3): Env {
  return {
    block: { height: 12_345, timeSeconds: BLOCK_TIME, chainId: "gatekeeper-test-1" },
    ...(txIndex === null ? {} : { transaction: { index: txIndex } }),
    contractAddress: "gateway0",
  };
}

// =============================================================================
// Governance VAAs
// =============================================================================

/** One guardian; every signature verifies */
export function makeVerifier(): GuardianSetVerifier {
  return new GuardianSetVerifier({
    guardianSets: [{ index: 0, keys: [new Uint8Array(20)], expirationTime: 0 }],
    scheme: { verify: () => true },
  });
}

export function registerChainVaa(
  address: string,
  chain: ChainId = CHAINS.Wormchain,
  sequence = 1n,
): Uint8Array {
  const payload = encodeGovernancePacket({
    module: TOKEN_BRIDGE_MODULE,
    targetChain: CHAINS.Any,
    action: { type: "register_chain", chain, emitterAddress: stringToBytes(address) },
  });
  const body = encodeVaaBody({
    timestamp: BLOCK_TIME,
    nonce: 0,
    emitterChain: GOVERNANCE_AUTHORITY.chain,
    emitterAddress: GOVERNANCE_AUTHORITY.address,
    sequence,
    consistencyLevel: 32,
    payload,
  });
  return encodeVaa(0, [{ guardianIndex: 0, signature: new Uint8Array(SIGNATURE_LENGTH) }], body);
}

// =============================================================================
// Host stand-ins
// =============================================================================

export const CORE_SEQUENCE_KEY = "core_sequence";

/**
 * Core bridge that counts posts in the store and reports them as
 * attributes. Set `failWith` to make every call throw.
 */
export class FakeCoreBridge implements CoreBridge {
  failWith: Error | undefined;
  readonly calls: string[] = [];

  instantiate(ctx: CallContext, msg: CoreInstantiateMsg): ContractResponse {
    this.calls.push("instantiate");
    this.check();
    ctx.store.set("core_fee_denom", JSON.stringify(msg.feeDenom));
    return withAttributes(emptyResponse(), attr("core", "instantiated"));
  }

  execute(ctx: CallContext, msg: CoreExecuteMsg): ContractResponse {
    this.calls.push(msg.type);
    this.check();
    if (msg.type === "submit_vaa") {
      return withAttributes(emptyResponse(), attr("action", "submit_vaa"));
    }
    const sequence = Number(ctx.store.get(CORE_SEQUENCE_KEY) ?? "0");
    ctx.store.set(CORE_SEQUENCE_KEY, String(sequence + 1));
    return withAttributes(
      emptyResponse(),
      attr("message.message", bytesToHex(msg.message)),
      attr("message.sender", ctx.info.sender),
      attr("message.nonce", msg.nonce),
      attr("message.sequence", sequence),
    );
  }

  migrate(): ContractResponse {
    this.calls.push("migrate");
    this.check();
    return withAttributes(emptyResponse(), attr("core", "migrated"));
  }

  private check(): void {
    if (this.failWith !== undefined) throw this.failWith;
  }
}

export function channel(channelId: string, counterpartyAddress: string): IbcChannel {
  return {
    endpoint: { portId: wasmPortId("gateway0"), channelId },
    counterpartyEndpoint: { portId: wasmPortId(counterpartyAddress), channelId: "channel-9" },
    connectionId: "connection-0",
    order: "unordered",
    version: "ibc-gatekeeper-1",
  };
}

export class FakeChannelDirectory implements ChannelDirectory {
  failWith: Error | undefined;

  constructor(public channels: IbcChannel[] = []) {}

  listChannels(): readonly IbcChannel[] {
    if (this.failWith !== undefined) throw this.failWith;
    return this.channels;
  }
}

export class FakeTransport implements IbcTransport {
  failWith: Error | undefined;
  readonly sent: OutboundPacket[] = [];

  sendPacket(packet: OutboundPacket): PacketReceipt {
    if (this.failWith !== undefined) throw this.failWith;
    this.sent.push(packet);
    return { sequence: this.sent.length };
  }
}

export const INSTANTIATE_MSG: CoreInstantiateMsg = {
  govChain: GOVERNANCE_AUTHORITY.chain,
  govAddress: GOVERNANCE_AUTHORITY.address,
  initialGuardianSet: { index: 0, keys: [new Uint8Array(20)], expirationTime: 0 },
  guardianSetExpiry: 86_400,
  chainId: CHAINS.Wormchain,
  feeDenom: "uworm",
};
