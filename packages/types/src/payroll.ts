/**
 * Payroll Types
 *
 * Primitives for interval-based payroll with pull-based settlement.
 *
 * Rules:
 * - Amounts are bigint in the smallest unit (wei-equivalent)
 * - Timestamps and intervals are integer seconds
 * - A schedule with amount 0n is the "no active schedule" sentinel
 */

/**
 * An account address: `0x` followed by 40 hex digits.
 * Stored and compared in lowercase.
 */
export type Address = string;

/**
 * Payment terms for a single recipient.
 */
export interface PaymentSchedule {
  /** Amount accrued per period. 0n means no active schedule. */
  readonly amount: bigint;

  /** Minimum number of seconds between two accruals. */
  readonly interval: number;

  /** Seconds of the last accrual (registration time initially). */
  readonly lastTimestamp: number;
}

/**
 * A schedule together with the recipient it belongs to.
 */
export interface RecipientSchedule {
  readonly recipient: Address;
  readonly schedule: PaymentSchedule;
}
