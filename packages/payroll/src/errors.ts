/**
 * @cadence/payroll — Errors.
 *
 * Every whole-call failure is a PayrollError with a stable `code`.
 * Transient insolvency is not an error (it is recorded as an event),
 * and neither is a stale or bogus settlement candidate (it is skipped).
 */

import type { Address } from "@cadence/types";

export type PayrollErrorCode =
  | "INVALID_SCHEDULE"
  | "INVALID_RECIPIENT"
  | "DUPLICATE_RECIPIENT"
  | "INVALID_AMOUNT"
  | "INVALID_SELECTION"
  | "INVALID_SNAPSHOT"
  | "UNAUTHORIZED"
  | "WITHDRAWAL_FAILED";

export class PayrollError extends Error {
  public readonly code: PayrollErrorCode;

  constructor(code: PayrollErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PayrollError";
    this.code = code;
  }
}

/** Amount or interval is zero, negative or not an integer. */
export class InvalidScheduleError extends PayrollError {
  constructor(message: string) {
    super("INVALID_SCHEDULE", message);
    this.name = "InvalidScheduleError";
  }
}

export class InvalidRecipientError extends PayrollError {
  constructor(value: string) {
    super("INVALID_RECIPIENT", `'${value}' is not a valid address`);
    this.name = "InvalidRecipientError";
  }
}

export class DuplicateRecipientError extends PayrollError {
  public readonly recipient: Address;

  constructor(recipient: Address) {
    super("DUPLICATE_RECIPIENT", `Recipient '${recipient}' already has an active schedule`);
    this.name = "DuplicateRecipientError";
    this.recipient = recipient;
  }
}

export class InvalidAmountError extends PayrollError {
  constructor(message: string) {
    super("INVALID_AMOUNT", message);
    this.name = "InvalidAmountError";
  }
}

/** The selection token could not be decoded. */
export class InvalidSelectionError extends PayrollError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_SELECTION", message, options);
    this.name = "InvalidSelectionError";
  }
}

export class InvalidSnapshotError extends PayrollError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_SNAPSHOT", message, options);
    this.name = "InvalidSnapshotError";
  }
}

export class UnauthorizedError extends PayrollError {
  public readonly caller: string;

  constructor(caller: string, action: string) {
    super("UNAUTHORIZED", `'${caller}' is not allowed to ${action}`);
    this.name = "UnauthorizedError";
    this.caller = caller;
  }
}

/**
 * The external transfer was rejected. State has been rolled back,
 * so the call can be retried once the receiving side accepts funds.
 */
export class WithdrawalFailedError extends PayrollError {
  public readonly recipient: Address;
  public readonly amount: bigint;

  constructor(recipient: Address, amount: bigint, reason: string, options?: ErrorOptions) {
    super(
      "WITHDRAWAL_FAILED",
      `Transfer of ${amount.toString()} to '${recipient}' failed: ${reason}`,
      options,
    );
    this.name = "WithdrawalFailedError";
    this.recipient = recipient;
    this.amount = amount;
  }
}
