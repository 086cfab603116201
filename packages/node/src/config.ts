/**
 * @cadence/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress, normalizeAddress } from "@cadence/types";
import type { Address } from "@cadence/types";
import { parseUnits } from "@cadence/ledger";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value), {
    message: "Must be a 0x-prefixed 20-byte hex address",
  })
  .transform((value) => value.toLowerCase());

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Payroll
  PAYROLL_ADDRESS: AddressSchema,
  PAYROLL_OWNER: AddressSchema,
  UNIT_DECIMALS: z.coerce.number().int().min(0).max(18).default(18),
  INITIAL_DEPOSIT: z
    .string()
    .regex(/^\d+(\.\d+)?$/, "Must be a non-negative decimal amount")
    .default("0"),
  RECIPIENTS: z.string().default(""),

  // Keeper
  KEEPER_INTERVAL_MS: z.coerce.number().int().min(100).default(15000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Recipient Parsing
// =============================================================================

export interface ParsedRecipient {
  readonly recipient: Address;
  /** Smallest unit */
  readonly amount: bigint;
  /** Seconds */
  readonly interval: number;
}

/**
 * Parse the RECIPIENTS env var into schedules to seed at boot.
 *
 * Format: "0xabc…:1.5:86400,0xdef…:2:3600" (address:amount:intervalSeconds)
 * Amounts are decimal strings scaled by `decimals`.
 */
export function parseRecipients(raw: string, decimals: number): readonly ParsedRecipient[] {
  if (raw.trim() === "") {
    return [];
  }

  const recipients: ParsedRecipient[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [address, amount, interval] = parts;
    if (parts.length !== 3 || address === undefined || amount === undefined || interval === undefined) {
      throw new Error(
        `Invalid RECIPIENTS entry: "${entry.trim()}". Expected format: address:amount:intervalSeconds`,
      );
    }

    const recipient = normalizeAddress(address);
    if (recipient === undefined) {
      throw new Error(`Invalid address "${address}" in RECIPIENTS`);
    }
    if (recipients.some((r) => r.recipient === recipient)) {
      throw new Error(`Duplicate address "${recipient}" in RECIPIENTS`);
    }

    const units = parseUnits(amount, decimals);
    if (units === 0n) {
      throw new Error(`Amount for "${recipient}" in RECIPIENTS must be positive`);
    }

    if (!/^\d+$/.test(interval) || Number(interval) === 0) {
      throw new Error(
        `Interval for "${recipient}" in RECIPIENTS must be a positive whole number of seconds, got "${interval}"`,
      );
    }

    recipients.push({ recipient, amount: units, interval: Number(interval) });
  }

  return recipients;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
