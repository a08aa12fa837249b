/**
 * @custody/demo — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Amounts are read as unsigned decimal strings and parsed to bigint.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const UNSIGNED = /^\d+$/;

function amount(fallback: string) {
  return z
    .string()
    .regex(UNSIGNED, "must be an unsigned integer")
    .default(fallback)
    .transform((v) => BigInt(v));
}

export const ConfigSchema = z
  .object({
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Vault policy
    VAULT_MIN_DEPOSIT: amount("1"),
    VAULT_MAX_DEPOSIT: z
      .string()
      .regex(UNSIGNED, "must be an unsigned integer")
      .transform((v) => BigInt(v))
      .optional(),

    // Host
    HOST_MAX_CALL_DEPTH: z.coerce.number().int().min(1).max(1024).default(64),

    // Attack scenario
    VICTIM_DEPOSIT: amount("1000"),
    ATTACK_STAKE: amount("100"),

    // Pause between walkthrough steps
    STEP_DELAY_MS: z.coerce.number().int().min(0).default(400),
  })
  .refine(
    (c) => c.VAULT_MAX_DEPOSIT === undefined || c.VAULT_MIN_DEPOSIT <= c.VAULT_MAX_DEPOSIT,
    { message: "VAULT_MIN_DEPOSIT must not exceed VAULT_MAX_DEPOSIT", path: ["VAULT_MIN_DEPOSIT"] },
  )
  .refine((c) => c.ATTACK_STAKE > 0n, {
    message: "ATTACK_STAKE must be positive",
    path: ["ATTACK_STAKE"],
  })
  .refine((c) => c.VICTIM_DEPOSIT > 0n, {
    message: "VICTIM_DEPOSIT must be positive",
    path: ["VICTIM_DEPOSIT"],
  });

export type DemoConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): DemoConfig {
  return ConfigSchema.parse(env);
}
