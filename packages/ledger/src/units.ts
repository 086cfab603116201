/**
 * @cadence/ledger — Integer unit arithmetic.
 *
 * Amounts live as bigint in the smallest unit (wei for 18 decimals).
 * Human-facing decimal strings are converted at the edges only.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are never negative
 * - Decimal strings must not carry more places than the unit allows
 */

import { LedgerError } from "./types.js";

/** Decimals of the native unit (1 ether = 10^18 wei). */
export const NATIVE_DECIMALS = 18;

/**
 * Parse a decimal string into the smallest unit.
 *
 * "0.1" with decimals=18 → 100000000000000000n
 * "25" with decimals=0 → 25n
 */
export function parseUnits(amount: string, decimals: number = NATIVE_DECIMALS): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the unit allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Format a smallest-unit amount as a decimal string.
 *
 * 100000000000000000n with decimals=18 → "0.100000000000000000"
 * 25n with decimals=0 → "25"
 */
export function formatUnits(value: bigint, decimals: number = NATIVE_DECIMALS): string {
  assertNonNegative(value);

  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

/**
 * Throws unless `value` is strictly positive.
 */
export function assertPositive(value: bigint, label = "Amount"): void {
  if (value <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be positive, got ${value.toString()}`);
  }
}

/**
 * Throws if `value` is negative.
 */
export function assertNonNegative(value: bigint, label = "Amount"): void {
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must not be negative, got ${value.toString()}`);
  }
}

/**
 * Parse a smallest-unit decimal string ("1000") as stored in snapshots.
 */
export function parseRaw(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid raw amount: "${value}"`);
  }
  return BigInt(value);
}
