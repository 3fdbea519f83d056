/**
 * Message Relay
 *
 * Forwards the result of a core post to the registered receiver over
 * IBC. The channel is looked up live on every relay; nothing about
 * channels is persisted.
 *
 * Ordering:
 * 1. resolveChannel() before the core post runs
 * 2. publish() with the core response, in the same transaction
 */

import type { Logger } from "pino";
import type { ContractResponse, Env, IbcChannel } from "@ibc-gatekeeper/types";
import { attr, withAttributes } from "@ibc-gatekeeper/types";
import type { KeyValueStore } from "@ibc-gatekeeper/state";
import { REGISTERED_ADDRESS } from "@ibc-gatekeeper/governance";
import { findCounterpartyChannel } from "./channel-resolver.js";
import { GatewayError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { encodePublishPacket } from "./packet.js";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Live view of the host's IBC channels.
 */
export interface ChannelDirectory {
  listChannels(): readonly IbcChannel[];
}

export interface OutboundPacket {
  readonly channelId: string;
  readonly data: Uint8Array;
  /** Absolute timeout, in seconds since the Unix epoch */
  readonly timeoutSeconds: number;
}

export interface PacketReceipt {
  /** Sequence the host assigned to the packet on its channel */
  readonly sequence: number;
}

/**
 * Queues packets for delivery. Throws when the packet is not accepted.
 */
export interface IbcTransport {
  sendPacket(packet: OutboundPacket): PacketReceipt;
}

// =============================================================================
// Relay
// =============================================================================

export interface MessageRelayConfig {
  readonly channels: ChannelDirectory;
  readonly transport: IbcTransport;
  readonly packetLifetimeSeconds: number;
  readonly logger?: Logger;
}

/**
 * Append `message.block_height` and, inside a transaction,
 * `message.tx_index`.
 */
export function withOrderingMetadata(
  response: ContractResponse,
  env: Env,
): ContractResponse {
  const enriched = withAttributes(response, attr("message.block_height", env.block.height));
  return env.transaction === undefined
    ? enriched
    : withAttributes(enriched, attr("message.tx_index", env.transaction.index));
}

export class MessageRelay {
  private readonly channels: ChannelDirectory;
  private readonly transport: IbcTransport;
  private readonly packetLifetimeSeconds: number;
  private readonly log: Logger;

  constructor(config: MessageRelayConfig) {
    this.channels = config.channels;
    this.transport = config.transport;
    this.packetLifetimeSeconds = config.packetLifetimeSeconds;
    this.log = config.logger ?? silentLogger();
  }

  /**
   * Channel to the registered receiver.
   *
   * @throws GatewayError COUNTERPARTY_NOT_REGISTERED, CHANNEL_QUERY_FAILED
   *   or CHANNEL_NOT_FOUND
   */
  resolveChannel(store: KeyValueStore): IbcChannel {
    const address = REGISTERED_ADDRESS.mayLoad(store);
    if (address === undefined) {
      throw new GatewayError(
        "COUNTERPARTY_NOT_REGISTERED",
        "No counterparty receiver registered",
      );
    }

    let channels: readonly IbcChannel[];
    try {
      channels = this.channels.listChannels();
    } catch (err) {
      throw new GatewayError(
        "CHANNEL_QUERY_FAILED",
        `Failed to query IBC channels: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    return findCounterpartyChannel(channels, address);
  }

  /**
   * Send the core response, with ordering metadata, as a publish packet.
   *
   * @returns the enriched response plus the packet's channel and sequence
   * @throws GatewayError PACKET_SEND_FAILED
   */
  publish(
    channel: IbcChannel,
    coreResponse: ContractResponse,
    env: Env,
  ): ContractResponse {
    const enriched = withOrderingMetadata(coreResponse, env);
    const channelId = channel.endpoint.channelId;

    let receipt: PacketReceipt;
    try {
      receipt = this.transport.sendPacket({
        channelId,
        data: encodePublishPacket(enriched),
        timeoutSeconds: env.block.timeSeconds + this.packetLifetimeSeconds,
      });
    } catch (err) {
      throw new GatewayError(
        "PACKET_SEND_FAILED",
        `Failed to send packet on ${channelId}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    this.log.info({ channelId, sequence: receipt.sequence }, "Publish packet sent");

    return withAttributes(
      enriched,
      attr("packet.channel_id", channelId),
      attr("packet.sequence", receipt.sequence),
    );
  }
}
