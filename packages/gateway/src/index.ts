/**
 * @ibc-gatekeeper/gateway — Gatekeeper contracts.
 *
 * Provides:
 * - IbcGateway: fronts the messaging core and relays posts over IBC
 * - ChainConnectionReceiver: counterparty-side registration and query
 * - VersionGate: forward-only migrations
 * - Publish packet codec, channel resolver, configuration and logging
 */

// Contracts
export { IbcGateway } from "./gateway.js";
export type { IbcGatewayConfig, GatewayExecuteMsg, GatewayQueryMsg } from "./gateway.js";
export { ChainConnectionReceiver } from "./receiver.js";
export type {
  ChainConnectionReceiverConfig,
  ReceiverExecuteMsg,
  ReceiverQueryMsg,
  SubmitUpdateChainConnectionMsg,
} from "./receiver.js";
export { queryChainConnection } from "./chain-connection.js";
export type { ChainConnectionQuery, ChainConnectionResponse } from "./chain-connection.js";

// Core bridge
export type {
  CoreBridge,
  CoreExecuteMsg,
  CoreInstantiateMsg,
  SubmitVaaMsg,
  PostMessageMsg,
  CallContext,
  MigrateContext,
} from "./core-bridge.js";

// Relay
export { MessageRelay, withOrderingMetadata } from "./relay.js";
export type {
  ChannelDirectory,
  IbcTransport,
  OutboundPacket,
  PacketReceipt,
  MessageRelayConfig,
} from "./relay.js";
export { findCounterpartyChannel } from "./channel-resolver.js";
export { encodePublishPacket, decodePublishPacket } from "./packet.js";
export type { PublishPacket } from "./packet.js";

// Versioning
export { VersionGate, INSTANTIATE_ACTION } from "./version-gate.js";
export { GATEWAY_CONTRACT, RECEIVER_CONTRACT, CONTRACT_VERSION } from "./version.js";

// Errors
export { GatewayError, delegate } from "./errors.js";
export type { GatewayErrorCode, GatewayErrorOptions } from "./errors.js";

// Config & logging
export { ConfigSchema, loadConfig, DEFAULT_PACKET_LIFETIME_SECONDS } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export { createGatekeeper } from "./bootstrap.js";
export type { Gatekeeper, HostBindings } from "./bootstrap.js";
