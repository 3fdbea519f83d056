/**
 * Governance Packet Codec
 *
 * Layout (big-endian):
 *
 *   module [32] | action u8 | targetChain u16 | action body
 *
 *   register_chain   (1): chain u16 | emitterAddress [32]
 *   contract_upgrade (2): newContract [32]
 *   recover_chain_id (3): evmChainId [32] | newChain u16
 *
 * The module name is ASCII, left-padded with zero bytes.
 * Trailing bytes after the action body are rejected.
 */

import {
  bytesToBigInt,
  concatBytes,
  numberToBytes,
  pad,
  stringToBytes,
} from "viem";
import { ByteReader, stripLeadingZeros } from "./bytes.js";
import type { GovernanceAction, GovernancePacket } from "./types.js";

export const TOKEN_BRIDGE_MODULE = "TokenBridge";

const MODULE_LENGTH = 32;
const ADDRESS_LENGTH = 32;

const ACTION_IDS = {
  register_chain: 1,
  contract_upgrade: 2,
  recover_chain_id: 3,
} as const satisfies Record<GovernanceAction["type"], number>;

/**
 * Decode a governance payload for the given module.
 *
 * @throws Error describing the first field that fails to decode
 */
export function decodeGovernancePacket(
  payload: Uint8Array,
  expectedModule: string = TOKEN_BRIDGE_MODULE,
): GovernancePacket {
  const reader = new ByteReader(payload);

  const moduleBytes = stripLeadingZeros(reader.bytes(MODULE_LENGTH, "module"));
  const module = new TextDecoder().decode(moduleBytes);
  if (module !== expectedModule) {
    throw new Error(`unexpected governance module "${module}", expected "${expectedModule}"`);
  }

  const actionId = reader.u8("action");
  const targetChain = reader.u16("target chain");

  let action: GovernanceAction;
  switch (actionId) {
    case ACTION_IDS.register_chain:
      action = {
        type: "register_chain",
        chain: reader.u16("chain"),
        emitterAddress: reader.bytes(ADDRESS_LENGTH, "emitter address"),
      };
      break;

    case ACTION_IDS.contract_upgrade:
      action = {
        type: "contract_upgrade",
        newContract: reader.bytes(ADDRESS_LENGTH, "new contract"),
      };
      break;

    case ACTION_IDS.recover_chain_id:
      action = {
        type: "recover_chain_id",
        evmChainId: bytesToBigInt(reader.bytes(32, "evm chain id")),
        newChain: reader.u16("new chain"),
      };
      break;

    default:
      throw new Error(`unknown governance action ${actionId}`);
  }

  reader.end();
  return { module, targetChain, action };
}

/**
 * Encode a governance packet.
 *
 * Byte fields shorter than 32 bytes are left-padded with zeros.
 */
export function encodeGovernancePacket(packet: GovernancePacket): Uint8Array {
  const header = [
    pad(stringToBytes(packet.module), { size: MODULE_LENGTH }),
    numberToBytes(ACTION_IDS[packet.action.type], { size: 1 }),
    numberToBytes(packet.targetChain, { size: 2 }),
  ];

  const action = packet.action;
  switch (action.type) {
    case "register_chain":
      return concatBytes([
        ...header,
        numberToBytes(action.chain, { size: 2 }),
        pad(action.emitterAddress, { size: ADDRESS_LENGTH }),
      ]);

    case "contract_upgrade":
      return concatBytes([...header, pad(action.newContract, { size: ADDRESS_LENGTH })]);

    case "recover_chain_id":
      return concatBytes([
        ...header,
        numberToBytes(action.evmChainId, { size: 32 }),
        numberToBytes(action.newChain, { size: 2 }),
      ]);
  }
}
