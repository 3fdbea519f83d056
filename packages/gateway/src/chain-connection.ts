/**
 * chain_connection query, shared by the gateway and the receiver.
 */

import type { ChainId } from "@ibc-gatekeeper/types";
import { chainName } from "@ibc-gatekeeper/types";
import type { KeyValueStore } from "@ibc-gatekeeper/state";
import { REGISTERED_ADDRESS } from "@ibc-gatekeeper/governance";
import { GatewayError } from "./errors.js";

export interface ChainConnectionQuery {
  readonly type: "chain_connection";
  readonly chainId: ChainId;
}

export interface ChainConnectionResponse {
  /** UTF-8 bytes of the registered receiver address */
  readonly connectionId: Uint8Array;
}

/**
 * Read-only; reflects the last committed registration.
 *
 * @throws GatewayError COUNTERPARTY_NOT_REGISTERED
 */
export function queryChainConnection(
  store: KeyValueStore,
  chainId: ChainId,
  counterpartyChain: ChainId,
): ChainConnectionResponse {
  const address = chainId === counterpartyChain ? REGISTERED_ADDRESS.mayLoad(store) : undefined;
  if (address === undefined) {
    throw new GatewayError(
      "COUNTERPARTY_NOT_REGISTERED",
      `No connection registered for chain ${chainName(chainId)}`,
    );
  }
  return { connectionId: new TextEncoder().encode(address) };
}
