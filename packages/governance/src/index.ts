/**
 * @ibc-gatekeeper/governance — Governance VAA authentication.
 *
 * Authenticates quorum-attested governance messages and applies the
 * RegisterChain action that binds the counterparty receiver address.
 *
 * Pipeline:
 * 1. Parse — VAA wire format (header, signatures, body)
 * 2. Verify — guardian set, quorum, per-signature check
 * 3. Authenticate — governance emitter only
 * 4. Decode — governance packet (module, action, target chain)
 * 5. Apply — persist the registered address, emit RegisterChain
 */

// Handler
export {
  GovernanceHandler,
  SUBMIT_UPDATE_VAA_ACTION,
  REGISTER_CHAIN_EVENT,
} from "./handler.js";
export type { GovernanceHandlerConfig, ChainRegistration } from "./handler.js";

// Authority
export { GOVERNANCE_AUTHORITY, isFromAuthority } from "./authority.js";

// Registered address slot
export { REGISTERED_ADDRESS, REGISTERED_ADDRESS_KEY } from "./registered-address.js";

// VAA codec & verification
export {
  parseVaa,
  encodeVaa,
  encodeVaaBody,
  vaaDigest,
  VAA_VERSION,
  SIGNATURE_LENGTH,
  EMITTER_ADDRESS_LENGTH,
} from "./vaa.js";
export type { VaaBody } from "./vaa.js";
export { GuardianSetVerifier, quorum } from "./guardian-set.js";
export type {
  GuardianSet,
  SignatureScheme,
  GuardianSetVerifierConfig,
} from "./guardian-set.js";

// Governance packet codec
export {
  decodeGovernancePacket,
  encodeGovernancePacket,
  TOKEN_BRIDGE_MODULE,
} from "./governance-packet.js";

// Types
export type {
  Attestation,
  AttestationVerifier,
  GuardianSignature,
  GovernancePacket,
  GovernanceAction,
  RegisterChainAction,
  ContractUpgradeAction,
  RecoverChainIdAction,
  GovernanceAuthority,
  VaaErrorCode,
  GovernanceErrorCode,
} from "./types.js";
export { VaaError, GovernanceError } from "./types.js";
