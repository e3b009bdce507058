/**
 * @coinwrap/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isParticipant } from "@coinwrap/types";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .trim()
  .refine(isParticipant, { message: "Must be a non-zero 0x-prefixed 40 hex digit address" })
  .transform((v) => v.toLowerCase());

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Synthetic token
  TOKEN_NAME: z.string().min(1).max(64).default("Wrapped Coin"),
  TOKEN_SYMBOL: z.string().min(1).max(16).default("WCOIN"),

  // Participants
  WRAPPER_ADDRESS: AddressSchema.default("0x000000000000000000000000000000000000c0de"),
  COIN_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000c0111"),
  ISSUER_ADDRESS: AddressSchema.default("0x0000000000000000000000000000000000001551"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid, or if two participant
 *   addresses coincide
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.superRefine((config, ctx) => {
    const addresses = [config.WRAPPER_ADDRESS, config.COIN_ADDRESS, config.ISSUER_ADDRESS];
    if (new Set(addresses).size !== addresses.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "WRAPPER_ADDRESS, COIN_ADDRESS and ISSUER_ADDRESS must be distinct",
      });
    }
  }).parse(env);
}
