/**
 * Gateway error types.
 *
 * Every failure aborts the call; staged writes are discarded by the
 * transaction wrapper and the error reaches the host unchanged.
 */

export type GatewayErrorCode =
  | "VERSION_MISMATCH"
  | "VERSION_PARSE_ERROR"
  | "VERSION_NOT_NEWER"
  | "CHANNEL_NOT_FOUND"
  | "CHANNEL_QUERY_FAILED"
  | "COUNTERPARTY_NOT_REGISTERED"
  | "CORE_DELEGATION_FAILURE"
  | "PACKET_SEND_FAILED"
  | "PACKET_DECODE_ERROR";

export interface GatewayErrorOptions extends ErrorOptions {
  /** Diagnostic context (e.g., the registered address a lookup used) */
  readonly details?: Record<string, unknown>;
}

/**
 * Structured error from the gateway and receiver contracts.
 * Always thrown, never returned.
 */
export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: GatewayErrorCode, message: string, options?: GatewayErrorOptions) {
    super(message, options);
    this.name = "GatewayError";
    this.code = code;
    this.details = options?.details;
  }
}

/**
 * Run a core bridge (or other collaborator) call, wrapping its failure.
 */
export function delegate<T>(context: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new GatewayError(
      "CORE_DELEGATION_FAILURE",
      `${context}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}
