/**
 * @ibc-gatekeeper/state — Contract version record.
 *
 * Every contract stores its name and semantic version under one
 * well-known key, so a migration can check what it is replacing.
 */

import { z } from "zod";
import type { KeyValueStore } from "./types.js";
import { Item } from "./item.js";

export const ContractVersionSchema = z.object({
  /** Contract name (e.g., "ibc-gatekeeper:gateway") */
  contract: z.string().min(1),
  /** Semantic version string; parsed only when compared */
  version: z.string().min(1),
});

export type ContractVersion = z.infer<typeof ContractVersionSchema>;

export const CONTRACT_VERSION_KEY = "contract_info";

const CONTRACT_VERSION = new Item(CONTRACT_VERSION_KEY, ContractVersionSchema);

export function getContractVersion(store: KeyValueStore): ContractVersion | undefined {
  return CONTRACT_VERSION.mayLoad(store);
}

export function setContractVersion(
  store: KeyValueStore,
  contract: string,
  version: string,
): void {
  CONTRACT_VERSION.save(store, { contract, version });
}
