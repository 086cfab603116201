/**
 * @cadence/payroll domain types.
 *
 * Cadence payroll pays a registered set of recipients on fixed intervals:
 * - A keeper scans for due payments (read-only) and gets a selection token
 * - Settlement re-checks every candidate and credits escrow
 * - Recipients pull their escrow out with a withdrawal
 */

import type { Address } from "@cadence/types";
import type { EventStore, PayrollEvent } from "@cadence/event-store";
import type { ContractVault, EscrowLedger, LedgerSnapshot } from "@cadence/ledger";
import type { Clock } from "./clock.js";
import type { FundsTransport } from "./transport.js";
import type { RecipientRegistry } from "./registry.js";
import type { ScheduleStore } from "./schedule.js";
import type { SelectionToken } from "./selection.js";

// =============================================================================
// State
// =============================================================================

/**
 * Everything a payroll call reads or writes. Owned by one Payroll instance.
 */
export interface PayrollState {
  readonly registry: RecipientRegistry;
  readonly schedules: ScheduleStore;
  readonly escrow: EscrowLedger;
  readonly vault: ContractVault;
}

/**
 * Collects the events a single call emits.
 */
export type Emit = (event: PayrollEvent) => void;

// =============================================================================
// Config
// =============================================================================

export interface PayrollConfig {
  /** The payroll's own address (the `from` of every outgoing transfer). */
  readonly address: string;
  /** Holder of the privileged capability. */
  readonly owner: string;
  readonly transport: FundsTransport;
  readonly clock?: Clock;
  readonly eventStore?: EventStore;
}

// =============================================================================
// Results
// =============================================================================

/**
 * What a mutating call emitted, in emission order.
 */
export interface PayrollReceipt {
  /** Shared by every event of the call. */
  readonly correlationId: string;
  readonly events: readonly PayrollEvent[];
}

export interface RemovalReceipt extends PayrollReceipt {
  /** False when the recipient was not registered (a no-op). */
  readonly removed: boolean;
}

/** Result of the read-only scan. */
export interface DueCheck {
  readonly hasDue: boolean;
  /** Due recipients, in registry order. */
  readonly candidates: readonly Address[];
  readonly token: SelectionToken;
}

export interface SettlementOutcome {
  /** Recipients credited, in candidate order. */
  readonly accrued: readonly Address[];
  /** Due recipients left unpaid for lack of unallocated funds. */
  readonly underfunded: readonly Address[];
  /** Candidates dropped as not due, unknown, malformed or duplicated. */
  readonly skipped: number;
}

export interface SettlementReport extends PayrollReceipt, SettlementOutcome {}

export interface TransferReceipt extends PayrollReceipt {
  /** Amount that left the payroll; 0n when nothing was paid. */
  readonly amount: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface ScheduleSnapshot {
  readonly recipient: Address;
  /** Smallest-unit decimal string */
  readonly amount: string;
  readonly interval: number;
  readonly lastTimestamp: number;
}

export interface PayrollSnapshot {
  readonly version: 1;
  readonly address: Address;
  readonly owner: Address;
  /** Active schedules in registry order. */
  readonly schedules: readonly ScheduleSnapshot[];
  readonly ledger: LedgerSnapshot;
  /** Payroll time (seconds) the snapshot was taken at. */
  readonly asOf: number;
}
