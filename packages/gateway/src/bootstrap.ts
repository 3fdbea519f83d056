/**
 * @ibc-gatekeeper/gateway — Wiring from configuration.
 *
 * Builds both contracts from environment configuration and the host's
 * collaborators.
 */

import type { Logger } from "pino";
import type { AttestationVerifier } from "@ibc-gatekeeper/governance";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import type { CoreBridge } from "./core-bridge.js";
import { IbcGateway } from "./gateway.js";
import { createLogger } from "./logger.js";
import { ChainConnectionReceiver } from "./receiver.js";
import type { ChannelDirectory, IbcTransport } from "./relay.js";

export interface HostBindings {
  readonly coreBridge: CoreBridge;
  readonly verifier: AttestationVerifier;
  readonly channels: ChannelDirectory;
  readonly transport: IbcTransport;
}

export interface Gatekeeper {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly gateway: IbcGateway;
  readonly receiver: ChainConnectionReceiver;
}

export function createGatekeeper(
  host: HostBindings,
  env: Record<string, string | undefined> = process.env,
): Gatekeeper {
  const config = loadConfig(env);
  const logger = createLogger(config);

  const gateway = new IbcGateway({
    ...host,
    counterpartyChain: config.COUNTERPARTY_CHAIN,
    packetLifetimeSeconds: config.PACKET_LIFETIME_SECONDS,
    logger,
  });
  const receiver = new ChainConnectionReceiver({
    verifier: host.verifier,
    counterpartyChain: config.COUNTERPARTY_CHAIN,
    logger,
  });

  logger.debug(
    { counterpartyChain: config.COUNTERPARTY_CHAIN, packetLifetimeSeconds: config.PACKET_LIFETIME_SECONDS },
    "Gatekeeper configured",
  );

  return { config, logger, gateway, receiver };
}
