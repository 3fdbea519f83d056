/**
 * IBC Channel Types
 *
 * Read-only view of the host's inter-chain channels.
 * Channels are queried live; nothing here is persisted.
 */

/**
 * One side of a channel.
 */
export interface IbcEndpoint {
  /** Port bound by the module or contract (e.g., "wasm.<address>") */
  readonly portId: string;

  /** Channel identifier on that side (e.g., "channel-0") */
  readonly channelId: string;
}

export type IbcOrder = "ordered" | "unordered";

/**
 * A channel as reported by the host's channel directory.
 */
export interface IbcChannel {
  /** Local end */
  readonly endpoint: IbcEndpoint;

  /** Remote end */
  readonly counterpartyEndpoint: IbcEndpoint;

  /** Underlying light-client connection */
  readonly connectionId: string;

  readonly order: IbcOrder;

  /** Negotiated channel version string */
  readonly version: string;
}

/**
 * Port prefix the host assigns to contract-bound ports.
 */
export const WASM_PORT_PREFIX = "wasm.";

/**
 * Port ID a contract at `address` is bound to.
 */
export function wasmPortId(address: string): string {
  return `${WASM_PORT_PREFIX}${address}`;
}
