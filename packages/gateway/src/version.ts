/**
 * Contract identities recorded by the version gate.
 */

export const GATEWAY_CONTRACT = "ibc-gatekeeper:gateway";
export const RECEIVER_CONTRACT = "ibc-gatekeeper:receiver";

/** Version of this build; a migration must move it strictly forward */
export const CONTRACT_VERSION = "0.1.0";
