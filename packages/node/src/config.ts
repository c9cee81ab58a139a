/**
 * @invite-escrow/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Amounts are decimal strings of 18-decimal base units.
 */

import { z } from "zod";
import { MAX_ESCROW_AMOUNT, MIN_ESCROW_AMOUNT } from "@invite-escrow/escrow";
import { AddressSchema, AmountSchema } from "./types/dto.js";

// =============================================================================
// Schema
// =============================================================================

/** 2020-10-15T00:00:00Z */
export const DEFAULT_DAY_ZERO_TIMESTAMP = 1_602_720_000;

export const DEFAULT_ASSET_REGISTRY = "0x00000000000000000000000000000000000000e5";

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Escrow
    MIN_ESCROW_AMOUNT: AmountSchema.default(MIN_ESCROW_AMOUNT.toString()),
    MAX_ESCROW_AMOUNT: AmountSchema.default(MAX_ESCROW_AMOUNT.toString()),
    DAY_ZERO_TIMESTAMP: z.coerce.number().int().min(0).default(DEFAULT_DAY_ZERO_TIMESTAMP),
    ASSET_REGISTRY_ADDRESS: AddressSchema.default(DEFAULT_ASSET_REGISTRY),
  })
  .refine((c) => c.MIN_ESCROW_AMOUNT > 0n, {
    message: "MIN_ESCROW_AMOUNT must be positive",
    path: ["MIN_ESCROW_AMOUNT"],
  })
  .refine((c) => c.MIN_ESCROW_AMOUNT <= c.MAX_ESCROW_AMOUNT, {
    message: "MIN_ESCROW_AMOUNT must not exceed MAX_ESCROW_AMOUNT",
    path: ["MAX_ESCROW_AMOUNT"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
