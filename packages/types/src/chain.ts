/**
 * Chain Types
 *
 * Cross-chain messaging protocol chain identifiers.
 *
 * Rules:
 * - Chain IDs are unsigned 16-bit integers on the wire
 * - ID 0 is the wildcard "Any" used by chain-agnostic governance
 * - Unknown IDs are representable; they only lack a display name
 */

/**
 * Numeric chain identifier (u16 on the wire).
 */
export type ChainId = number;

/**
 * Well-known chain identifiers.
 */
export const CHAINS = {
  Any: 0,
  Solana: 1,
  Ethereum: 2,
  Terra: 3,
  Bsc: 4,
  Polygon: 5,
  Avalanche: 6,
  Algorand: 8,
  Fantom: 10,
  Celo: 14,
  Near: 15,
  Terra2: 18,
  Injective: 19,
  Osmosis: 20,
  Sui: 21,
  Aptos: 22,
  Arbitrum: 23,
  Optimism: 24,
  Base: 30,
  Sei: 32,
  Wormchain: 3104,
  Cosmoshub: 4000,
  Evmos: 4001,
  Kujira: 4002,
} as const satisfies Record<string, ChainId>;

export type ChainName = keyof typeof CHAINS;

const namesById = new Map<ChainId, string>(
  Object.entries(CHAINS).map(([name, id]) => [id, name]),
);

/**
 * Display name for a chain ID. Unknown IDs render as their decimal value.
 */
export function chainName(chainId: ChainId): string {
  return namesById.get(chainId) ?? String(chainId);
}
