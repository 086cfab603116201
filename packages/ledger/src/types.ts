/**
 * @cadence/ledger — Ledger types and errors.
 *
 * Rules:
 * - All amounts are bigint in the smallest unit
 * - Balances never go negative
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@cadence/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_FUNDS"
  | "DUPLICATE_ENTRY";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * One escrow balance in serialized form.
 */
export interface EscrowEntry {
  readonly recipient: Address;
  /** Balance in the smallest unit, as a decimal string. */
  readonly balance: string;
}

/**
 * Serializable state of the escrow ledger and the contract vault.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly contractBalance: string;
  readonly escrow: readonly EscrowEntry[];
}
