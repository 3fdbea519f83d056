/**
 * Chain Connection Receiver
 *
 * Counterparty-side contract. Accepts batches of governance VAAs that
 * register the chain connection and answers chain_connection queries.
 */

import type { Logger } from "pino";
import type { ChainId, ContractResponse, Env, MessageInfo } from "@ibc-gatekeeper/types";
import { emptyResponse } from "@ibc-gatekeeper/types";
import { withTransaction } from "@ibc-gatekeeper/state";
import type { KeyValueStore } from "@ibc-gatekeeper/state";
import { GovernanceHandler } from "@ibc-gatekeeper/governance";
import type { AttestationVerifier } from "@ibc-gatekeeper/governance";
import { queryChainConnection } from "./chain-connection.js";
import type { ChainConnectionQuery, ChainConnectionResponse } from "./chain-connection.js";
import { silentLogger } from "./logger.js";
import { CONTRACT_VERSION, RECEIVER_CONTRACT } from "./version.js";
import { VersionGate } from "./version-gate.js";

export interface SubmitUpdateChainConnectionMsg {
  readonly type: "submit_update_chain_connection";
  readonly vaas: readonly Uint8Array[];
}

export type ReceiverExecuteMsg = SubmitUpdateChainConnectionMsg;
export type ReceiverQueryMsg = ChainConnectionQuery;

export interface ChainConnectionReceiverConfig {
  readonly verifier: AttestationVerifier;
  readonly counterpartyChain: ChainId;
  readonly version?: string;
  readonly logger?: Logger;
}

export class ChainConnectionReceiver {
  private readonly counterpartyChain: ChainId;
  private readonly gate: VersionGate;
  private readonly governance: GovernanceHandler;
  private readonly log: Logger;

  constructor(config: ChainConnectionReceiverConfig) {
    this.counterpartyChain = config.counterpartyChain;
    this.log = (config.logger ?? silentLogger()).child({ component: "receiver" });
    this.gate = new VersionGate(RECEIVER_CONTRACT, config.version ?? CONTRACT_VERSION);
    this.governance = new GovernanceHandler({
      verifier: config.verifier,
      counterpartyChain: config.counterpartyChain,
      logger: this.log,
    });
  }

  instantiate(store: KeyValueStore, info: MessageInfo): ContractResponse {
    const response = withTransaction(store, (tx) => this.gate.instantiate(tx, info.sender));
    this.log.info({ contract: this.gate.contract, version: this.gate.version }, "Instantiated");
    return response;
  }

  /**
   * Apply every VAA of the batch, or none of them.
   */
  execute(
    store: KeyValueStore,
    env: Env,
    info: MessageInfo,
    msg: ReceiverExecuteMsg,
  ): ContractResponse {
    switch (msg.type) {
      case "submit_update_chain_connection":
        return this.governance.submitBatch(store, msg.vaas, env, info);
    }
  }

  migrate(store: KeyValueStore): ContractResponse {
    const replaced = withTransaction(store, (tx) => this.gate.migrate(tx));
    this.log.info({ from: replaced.version, to: this.gate.version }, "Migrated");
    return emptyResponse();
  }

  query(store: KeyValueStore, msg: ReceiverQueryMsg): ChainConnectionResponse {
    switch (msg.type) {
      case "chain_connection":
        return queryChainConnection(store, msg.chainId, this.counterpartyChain);
    }
  }
}
