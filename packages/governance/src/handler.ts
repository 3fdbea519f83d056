/**
 * Governance Handler
 *
 * Authenticates governance VAAs and applies the one action this
 * gatekeeper accepts: RegisterChain for its counterparty chain.
 *
 * Steps, each fail-closed:
 * 1. Verify the VAA (signatures, guardian set)
 * 2. Require the governance authority as emitter
 * 3. Decode the payload as a governance packet
 * 4. Require the wildcard target chain
 * 5. Apply RegisterChain; reject every other action
 */

import pino from "pino";
import type { Logger } from "pino";
import type {
  ChainId,
  ContractEvent,
  ContractResponse,
  Env,
  MessageInfo,
} from "@ibc-gatekeeper/types";
import {
  CHAINS,
  attr,
  chainName,
  emptyResponse,
  withAttributes,
  withEvent,
} from "@ibc-gatekeeper/types";
import { withTransaction } from "@ibc-gatekeeper/state";
import type { KeyValueStore } from "@ibc-gatekeeper/state";
import { GOVERNANCE_AUTHORITY, isFromAuthority } from "./authority.js";
import { stripLeadingZeros } from "./bytes.js";
import { decodeGovernancePacket } from "./governance-packet.js";
import { REGISTERED_ADDRESS } from "./registered-address.js";
import type {
  Attestation,
  AttestationVerifier,
  GovernancePacket,
  RegisterChainAction,
} from "./types.js";
import { GovernanceError } from "./types.js";

export const SUBMIT_UPDATE_VAA_ACTION = "submit_update_vaa";
export const REGISTER_CHAIN_EVENT = "RegisterChain";

export interface GovernanceHandlerConfig {
  readonly verifier: AttestationVerifier;

  /** Chain a RegisterChain action must name: the chain this gatekeeper pairs with */
  readonly counterpartyChain: ChainId;

  readonly logger?: Logger;
}

/**
 * A RegisterChain action that passed every check.
 */
export interface ChainRegistration {
  readonly chain: ChainId;
  readonly address: string;
}

export class GovernanceHandler {
  private readonly verifier: AttestationVerifier;
  private readonly counterpartyChain: ChainId;
  private readonly log: Logger;
  private readonly addressDecoder = new TextDecoder("utf-8", { fatal: true });

  constructor(config: GovernanceHandlerConfig) {
    this.verifier = config.verifier;
    this.counterpartyChain = config.counterpartyChain;
    this.log = (config.logger ?? pino({ level: "silent" })).child({
      module: "governance",
    });
  }

  /**
   * Submit one governance VAA.
   */
  submit(
    store: KeyValueStore,
    vaa: Uint8Array,
    env: Env,
    info: MessageInfo,
  ): ContractResponse {
    return this.submitBatch(store, [vaa], env, info);
  }

  /**
   * Submit VAAs in order. The first failure aborts the batch and no
   * registration from it is persisted.
   */
  submitBatch(
    store: KeyValueStore,
    vaas: readonly Uint8Array[],
    env: Env,
    info: MessageInfo,
  ): ContractResponse {
    const events = withTransaction(store, (tx) =>
      vaas.map((vaa, position) => this.apply(tx, vaa, env, position)),
    );

    let response = withAttributes(
      emptyResponse(),
      attr("action", SUBMIT_UPDATE_VAA_ACTION),
      attr("owner", info.sender),
    );
    for (const event of events) {
      response = withEvent(response, event);
    }
    return response;
  }

  /**
   * Run every check on a VAA without persisting anything.
   *
   * @throws GovernanceError with the code of the first failed check
   */
  authorize(vaa: Uint8Array, blockTimeSeconds: number): ChainRegistration {
    let attestation: Attestation;
    try {
      attestation = this.verifier.parseAndVerify(vaa, blockTimeSeconds);
    } catch (err) {
      throw new GovernanceError(
        "ATTESTATION_INVALID",
        `VAA failed verification: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!isFromAuthority(attestation, GOVERNANCE_AUTHORITY)) {
      throw new GovernanceError(
        "UNTRUSTED_EMITTER",
        `VAA from chain ${chainName(attestation.emitterChain)} is not from the governance emitter`,
      );
    }

    let packet: GovernancePacket;
    try {
      packet = decodeGovernancePacket(attestation.payload);
    } catch (err) {
      throw new GovernanceError(
        "PAYLOAD_DECODE_ERROR",
        `Failed to parse governance packet: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (packet.targetChain !== CHAINS.Any) {
      throw new GovernanceError(
        "WRONG_TARGET_CHAIN",
        `Governance VAA targets chain ${chainName(packet.targetChain)}, expected Any`,
      );
    }

    switch (packet.action.type) {
      case "register_chain":
        return this.authorizeRegistration(packet.action);
      case "contract_upgrade":
      case "recover_chain_id":
        throw new GovernanceError(
          "UNSUPPORTED_GOVERNANCE_ACTION",
          `Unsupported governance action "${packet.action.type}"`,
        );
    }
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private apply(
    store: KeyValueStore,
    vaa: Uint8Array,
    env: Env,
    position: number,
  ): ContractEvent {
    let registration: ChainRegistration;
    try {
      registration = this.authorize(vaa, env.block.timeSeconds);
    } catch (err) {
      if (err instanceof GovernanceError) {
        this.log.warn({ code: err.code, position }, "Governance VAA rejected");
      }
      throw err;
    }

    REGISTERED_ADDRESS.save(store, registration.address);
    this.log.info(
      { chain: registration.chain, address: registration.address },
      "Counterparty receiver registered",
    );

    return {
      type: REGISTER_CHAIN_EVENT,
      attributes: [
        attr("chain", chainName(registration.chain)),
        attr("emitter_address", registration.address),
      ],
    };
  }

  private authorizeRegistration(action: RegisterChainAction): ChainRegistration {
    if (action.chain !== this.counterpartyChain) {
      throw new GovernanceError(
        "WRONG_CHAIN_REGISTRATION",
        `RegisterChain names chain ${chainName(action.chain)}, expected ${chainName(this.counterpartyChain)}`,
      );
    }

    // Addresses are left-padded with zero bytes to 32; the padding is not part of the address
    let address: string;
    try {
      address = this.addressDecoder.decode(stripLeadingZeros(action.emitterAddress));
    } catch (err) {
      throw new GovernanceError(
        "ADDRESS_DECODE_ERROR",
        "Failed to parse chain registration address as UTF-8",
        { cause: err },
      );
    }
    if (address.length === 0) {
      throw new GovernanceError(
        "ADDRESS_DECODE_ERROR",
        "Chain registration address is empty",
      );
    }

    return { chain: action.chain, address };
  }
}
