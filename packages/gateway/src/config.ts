/**
 * @ibc-gatekeeper/gateway — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { CHAINS } from "@ibc-gatekeeper/types";

// =============================================================================
// Schema
// =============================================================================

/** One year, in seconds */
export const DEFAULT_PACKET_LIFETIME_SECONDS = 31_536_000;

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Chain this deployment pairs with
  COUNTERPARTY_CHAIN: z.coerce
    .number()
    .int()
    .min(0)
    .max(0xffff)
    .default(CHAINS.Wormchain),

  // Outbound packets
  PACKET_LIFETIME_SECONDS: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_PACKET_LIFETIME_SECONDS),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
