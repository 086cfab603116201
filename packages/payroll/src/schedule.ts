/**
 * @cadence/payroll — Schedule store and due-payment evaluator.
 *
 * One PaymentSchedule per recipient. A missing entry reads as the zero
 * sentinel, so "no active schedule" and "never registered" look the same.
 *
 * Lifecycle:
 * - created on add (lastTimestamp = now)
 * - lastTimestamp advanced on accrual; amount and interval never change
 * - deleted on removal
 */

import type { Address, PaymentSchedule, RecipientSchedule } from "@cadence/types";
import { InvalidScheduleError } from "./errors.js";

export const ZERO_SCHEDULE: PaymentSchedule = Object.freeze({
  amount: 0n,
  interval: 0,
  lastTimestamp: 0,
});

/**
 * True once strictly more than `interval` seconds have passed since the
 * last accrual. A payment is not due at exactly `interval` seconds.
 */
export function isDue(schedule: PaymentSchedule, now: number): boolean {
  return (
    schedule.amount > 0n &&
    schedule.interval > 0 &&
    now - schedule.lastTimestamp > schedule.interval
  );
}

export function isActive(schedule: PaymentSchedule): boolean {
  return schedule.amount > 0n;
}

/**
 * @throws InvalidScheduleError unless amount > 0 and interval is a positive integer
 */
export function validateTerms(amount: bigint, interval: number): void {
  if (amount <= 0n) {
    throw new InvalidScheduleError(`Payment amount must be positive, got ${amount.toString()}`);
  }
  if (!Number.isSafeInteger(interval) || interval <= 0) {
    throw new InvalidScheduleError(
      `Payment interval must be a positive whole number of seconds, got ${interval}`,
    );
  }
}

export class ScheduleStore {
  private readonly _schedules = new Map<Address, PaymentSchedule>();

  get(recipient: Address): PaymentSchedule {
    return this._schedules.get(recipient) ?? ZERO_SCHEDULE;
  }

  hasActive(recipient: Address): boolean {
    return isActive(this.get(recipient));
  }

  create(recipient: Address, amount: bigint, interval: number, now: number): PaymentSchedule {
    validateTerms(amount, interval);
    const schedule: PaymentSchedule = { amount, interval, lastTimestamp: now };
    this._schedules.set(recipient, schedule);
    return schedule;
  }

  /**
   * Mark the recipient as paid at `now`.
   */
  advance(recipient: Address, now: number): PaymentSchedule {
    const advanced: PaymentSchedule = { ...this.get(recipient), lastTimestamp: now };
    this._schedules.set(recipient, advanced);
    return advanced;
  }

  delete(recipient: Address): void {
    this._schedules.delete(recipient);
  }

  restore(entries: readonly RecipientSchedule[]): void {
    for (const { recipient, schedule } of entries) {
      validateTerms(schedule.amount, schedule.interval);
      this._schedules.set(recipient, schedule);
    }
  }
}
