/**
 * Call Context Types
 *
 * What the host tells a contract about the call it is executing.
 */

/**
 * Block the call executes in.
 */
export interface BlockInfo {
  readonly height: number;

  /** Block time, in seconds since the Unix epoch */
  readonly timeSeconds: number;

  /** Host chain identifier (e.g., "wormchain-1") */
  readonly chainId: string;
}

/**
 * Present only when the call runs inside a transaction.
 * Absent for block-level hooks (begin/end block).
 */
export interface TransactionInfo {
  /** Position of the transaction within its block */
  readonly index: number;
}

export interface Env {
  readonly block: BlockInfo;
  readonly transaction?: TransactionInfo;
  /** Address of the executing contract */
  readonly contractAddress: string;
}

/**
 * Caller identity.
 */
export interface MessageInfo {
  readonly sender: string;
}
