/**
 * Channel Resolver
 *
 * Picks the channel whose remote end is bound to the registered
 * receiver contract.
 */

import type { IbcChannel } from "@ibc-gatekeeper/types";
import { wasmPortId } from "@ibc-gatekeeper/types";
import { GatewayError } from "./errors.js";

/**
 * First channel, in directory order, whose counterparty port is
 * `wasm.<receiverAddress>`.
 *
 * @throws GatewayError CHANNEL_NOT_FOUND
 */
export function findCounterpartyChannel(
  channels: readonly IbcChannel[],
  receiverAddress: string,
): IbcChannel {
  const portId = wasmPortId(receiverAddress);
  const channel = channels.find((c) => c.counterpartyEndpoint.portId === portId);
  if (channel === undefined) {
    throw new GatewayError(
      "CHANNEL_NOT_FOUND",
      `No channel connected to ${portId}`,
      { details: { address: receiverAddress } },
    );
  }
  return channel;
}
