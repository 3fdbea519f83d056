/**
 * Version Gate
 *
 * Records the contract name and semantic version at instantiation and
 * only lets a migration replace a strictly older build of the same
 * contract.
 */

import semver from "semver";
import type { SemVer } from "semver";
import type { ContractResponse } from "@ibc-gatekeeper/types";
import { attr, emptyResponse, withAttributes } from "@ibc-gatekeeper/types";
import { getContractVersion, setContractVersion } from "@ibc-gatekeeper/state";
import type { ContractVersion, KeyValueStore } from "@ibc-gatekeeper/state";
import { GatewayError } from "./errors.js";

export const INSTANTIATE_ACTION = "instantiate";

export class VersionGate {
  constructor(
    /** Contract name (e.g., "ibc-gatekeeper:gateway") */
    readonly contract: string,
    /** Version of this build */
    readonly version: string,
  ) {}

  /**
   * Record this build's name and version, overwriting any earlier record.
   */
  instantiate(store: KeyValueStore, owner: string): ContractResponse {
    setContractVersion(store, this.contract, this.version);
    return withAttributes(
      emptyResponse(),
      attr("action", INSTANTIATE_ACTION),
      attr("owner", owner),
      attr("version", this.version),
    );
  }

  /**
   * Check the stored record and replace it with this build's.
   *
   * @returns the record that was replaced
   */
  migrate(store: KeyValueStore): ContractVersion {
    const stored = getContractVersion(store);
    if (stored === undefined) {
      throw new GatewayError(
        "VERSION_MISMATCH",
        `No contract version stored, expected ${this.contract}`,
      );
    }
    if (stored.contract !== this.contract) {
      throw new GatewayError(
        "VERSION_MISMATCH",
        `Cannot migrate ${stored.contract} to ${this.contract}`,
        { details: { stored: stored.contract, expected: this.contract } },
      );
    }

    const from = parseVersion(stored.version);
    const to = parseVersion(this.version);
    if (!semver.gt(to, from)) {
      throw new GatewayError(
        "VERSION_NOT_NEWER",
        `Version ${to.version} is not newer than stored version ${from.version}`,
      );
    }

    setContractVersion(store, this.contract, this.version);
    return stored;
  }
}

/**
 * Strict parse: the string must already be in canonical form, so a
 * leading "v" or surrounding whitespace is rejected.
 */
function parseVersion(version: string): SemVer {
  const parsed = semver.parse(version);
  if (parsed === null || canonical(parsed) !== version) {
    throw new GatewayError(
      "VERSION_PARSE_ERROR",
      `Invalid semantic version "${version}"`,
    );
  }
  return parsed;
}

function canonical(parsed: SemVer): string {
  return parsed.build.length === 0
    ? parsed.version
    : `${parsed.version}+${parsed.build.join(".")}`;
}
