/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * Used where data crosses a process or chain boundary
 * (decoded packets, host-supplied values).
 */

import type { Attribute, ContractEvent, ContractResponse } from "./response.js";

// =============================================================================
// Response guards
// =============================================================================

export function isAttribute(value: unknown): value is Attribute {
  return (
    typeof value === "object" &&
    value !== null &&
    "key" in value &&
    typeof value.key === "string" &&
    "value" in value &&
    typeof value.value === "string"
  );
}

export function isContractEvent(value: unknown): value is ContractEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    value.type.length > 0 &&
    "attributes" in value &&
    Array.isArray(value.attributes) &&
    value.attributes.every(isAttribute)
  );
}

export function isContractResponse(value: unknown): value is ContractResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "attributes" in value &&
    Array.isArray(value.attributes) &&
    value.attributes.every(isAttribute) &&
    "events" in value &&
    Array.isArray(value.events) &&
    value.events.every(isContractEvent)
  );
}
