/**
 * Contract Response Types
 *
 * The attribute/event bundle every entry point returns to the host.
 *
 * Rules:
 * - Responses are immutable; builders return new objects
 * - Attribute order is significant and preserved
 */

/**
 * A key/value pair attached to a response or an event.
 */
export interface Attribute {
  readonly key: string;
  readonly value: string;
}

/**
 * A typed event carrying its own attributes.
 */
export interface ContractEvent {
  /** Event type (e.g., "RegisterChain") */
  readonly type: string;
  readonly attributes: readonly Attribute[];
}

/**
 * Response returned from instantiate, execute and migrate.
 */
export interface ContractResponse {
  readonly attributes: readonly Attribute[];
  readonly events: readonly ContractEvent[];
}

// =============================================================================
// Builders
// =============================================================================

export function emptyResponse(): ContractResponse {
  return { attributes: [], events: [] };
}

export function withAttributes(
  response: ContractResponse,
  ...attributes: readonly Attribute[]
): ContractResponse {
  return { ...response, attributes: [...response.attributes, ...attributes] };
}

export function withEvent(
  response: ContractResponse,
  event: ContractEvent,
): ContractResponse {
  return { ...response, events: [...response.events, event] };
}

export function attr(key: string, value: string | number): Attribute {
  return { key, value: String(value) };
}
