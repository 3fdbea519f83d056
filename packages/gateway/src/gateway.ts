/**
 * IBC Gateway
 *
 * Integrator-facing contract. Fronts the messaging core, accepts
 * governance updates of the counterparty receiver address, and relays
 * every posted message to that receiver over IBC.
 *
 * Every entry point runs in one transaction: a failure anywhere,
 * including in the relay, discards all writes of the call.
 */

import type { Logger } from "pino";
import type { ChainId, ContractResponse, Env, MessageInfo } from "@ibc-gatekeeper/types";
import { withTransaction } from "@ibc-gatekeeper/state";
import type { KeyValueStore } from "@ibc-gatekeeper/state";
import { GovernanceHandler } from "@ibc-gatekeeper/governance";
import type { AttestationVerifier } from "@ibc-gatekeeper/governance";
import { queryChainConnection } from "./chain-connection.js";
import type { ChainConnectionQuery, ChainConnectionResponse } from "./chain-connection.js";
import type {
  CallContext,
  CoreBridge,
  CoreExecuteMsg,
  CoreInstantiateMsg,
  PostMessageMsg,
} from "./core-bridge.js";
import { delegate } from "./errors.js";
import { silentLogger } from "./logger.js";
import { MessageRelay } from "./relay.js";
import type { ChannelDirectory, IbcTransport } from "./relay.js";
import { CONTRACT_VERSION, GATEWAY_CONTRACT } from "./version.js";
import { VersionGate } from "./version-gate.js";
import { DEFAULT_PACKET_LIFETIME_SECONDS } from "./config.js";

// =============================================================================
// Messages
// =============================================================================

export type GatewayExecuteMsg =
  | { readonly type: "submit_update_receiver_vaa"; readonly vaa: Uint8Array }
  | { readonly type: "core"; readonly msg: CoreExecuteMsg };

export type GatewayQueryMsg = ChainConnectionQuery;

// =============================================================================
// Gateway
// =============================================================================

export interface IbcGatewayConfig {
  readonly coreBridge: CoreBridge;
  readonly verifier: AttestationVerifier;
  readonly channels: ChannelDirectory;
  readonly transport: IbcTransport;
  readonly counterpartyChain: ChainId;
  readonly packetLifetimeSeconds?: number;
  /** Build version recorded on instantiate; defaults to CONTRACT_VERSION */
  readonly version?: string;
  readonly logger?: Logger;
}

export class IbcGateway {
  private readonly core: CoreBridge;
  private readonly counterpartyChain: ChainId;
  private readonly gate: VersionGate;
  private readonly governance: GovernanceHandler;
  private readonly relay: MessageRelay;
  private readonly log: Logger;

  constructor(config: IbcGatewayConfig) {
    this.core = config.coreBridge;
    this.counterpartyChain = config.counterpartyChain;
    this.log = (config.logger ?? silentLogger()).child({ component: "gateway" });
    this.gate = new VersionGate(GATEWAY_CONTRACT, config.version ?? CONTRACT_VERSION);
    this.governance = new GovernanceHandler({
      verifier: config.verifier,
      counterpartyChain: config.counterpartyChain,
      logger: this.log,
    });
    this.relay = new MessageRelay({
      channels: config.channels,
      transport: config.transport,
      packetLifetimeSeconds:
        config.packetLifetimeSeconds ?? DEFAULT_PACKET_LIFETIME_SECONDS,
      logger: this.log,
    });
  }

  instantiate(
    store: KeyValueStore,
    env: Env,
    info: MessageInfo,
    msg: CoreInstantiateMsg,
  ): ContractResponse {
    const response = withTransaction(store, (tx) => {
      const own = this.gate.instantiate(tx, info.sender);
      const core = delegate("core bridge instantiate failed", () =>
        this.core.instantiate({ store: tx, env, info }, msg),
      );
      return {
        attributes: [...own.attributes, ...core.attributes],
        events: core.events,
      };
    });
    this.log.info({ contract: this.gate.contract, version: this.gate.version }, "Instantiated");
    return response;
  }

  execute(
    store: KeyValueStore,
    env: Env,
    info: MessageInfo,
    msg: GatewayExecuteMsg,
  ): ContractResponse {
    return withTransaction(store, (tx) => {
      switch (msg.type) {
        case "submit_update_receiver_vaa":
          return this.governance.submit(tx, msg.vaa, env, info);
        case "core":
          return this.executeCore({ store: tx, env, info }, msg.msg);
      }
    });
  }

  migrate(store: KeyValueStore, env: Env): ContractResponse {
    const [replaced, response] = withTransaction(store, (tx) => {
      const previous = this.gate.migrate(tx);
      const core = delegate("core bridge migrate failed", () =>
        this.core.migrate({ store: tx, env }),
      );
      return [previous, core] as const;
    });
    this.log.info({ from: replaced.version, to: this.gate.version }, "Migrated");
    return response;
  }

  query(store: KeyValueStore, msg: GatewayQueryMsg): ChainConnectionResponse {
    switch (msg.type) {
      case "chain_connection":
        return queryChainConnection(store, msg.chainId, this.counterpartyChain);
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private executeCore(ctx: CallContext, msg: CoreExecuteMsg): ContractResponse {
    switch (msg.type) {
      case "submit_vaa":
        return delegate("core bridge execute failed", () =>
          this.core.execute(ctx, msg),
        );
      case "post_message":
        return this.postMessage(ctx, msg);
    }
  }

  private postMessage(ctx: CallContext, msg: PostMessageMsg): ContractResponse {
    const channel = this.relay.resolveChannel(ctx.store);
    const core = delegate("core bridge execute failed", () =>
      this.core.execute(ctx, msg),
    );
    return this.relay.publish(channel, core, ctx.env);
  }
}
