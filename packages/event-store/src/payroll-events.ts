/**
 * @cadence/event-store — Payroll domain event definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Payloads carry amounts as decimal strings of the smallest unit so that
 * they survive JSON canonicalization. They are declared as type aliases
 * (not interfaces) so they stay assignable to DomainEvent's payload record.
 */

// =============================================================================
// Event Types
// =============================================================================

export const PAYROLL_EVENTS = {
  RECIPIENT_ADDED: "payroll.recipient.added",
  RECIPIENT_REMOVED: "payroll.recipient.removed",
  PAYMENT_ACCRUED: "payroll.payment.accrued",
  ACCRUAL_INSUFFICIENT_BALANCE: "payroll.accrual.insufficient-balance",
  WITHDRAWAL_TRANSFERRED: "payroll.withdrawal.transferred",
  WITHDRAWAL_INSUFFICIENT_BALANCE: "payroll.withdrawal.insufficient-balance",
  FUNDS_SWEPT: "payroll.funds.swept",
  OWNERSHIP_TRANSFERRED: "payroll.ownership.transferred",
} as const;

export type PayrollEventType = (typeof PAYROLL_EVENTS)[keyof typeof PAYROLL_EVENTS];

const EVENT_TYPES = new Set<string>(Object.values(PAYROLL_EVENTS));

export function isPayrollEventType(value: unknown): value is PayrollEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

// =============================================================================
// Payloads
// =============================================================================

export type RecipientAddedPayload = {
  readonly recipient: string;
  readonly amount: string;
  readonly interval: number;
  readonly lastTimestamp: number;
};

export type RecipientRemovedPayload = {
  readonly recipient: string;
};

export type PaymentAccruedPayload = {
  readonly recipient: string;
  readonly amount: string;
  /** Escrow balance after the credit */
  readonly escrowBalance: string;
  readonly timestamp: number;
};

/** Emitted instead of an accrual when the unallocated balance is short. */
export type AccrualInsufficientBalancePayload = {
  readonly recipient: string;
  readonly required: string;
  readonly available: string;
};

export type WithdrawalTransferredPayload = {
  readonly from: string;
  readonly to: string;
  readonly amount: string;
};

/** Emitted when a withdrawal cannot be covered by the live contract balance. */
export type WithdrawalInsufficientBalancePayload = {
  readonly recipient: string;
  readonly required: string;
  readonly available: string;
};

export type FundsSweptPayload = {
  readonly to: string;
  readonly amount: string;
};

export type OwnershipTransferredPayload = {
  readonly previousOwner: string;
  readonly newOwner: string;
};

export type PayrollEventPayloads = {
  readonly "payroll.recipient.added": RecipientAddedPayload;
  readonly "payroll.recipient.removed": RecipientRemovedPayload;
  readonly "payroll.payment.accrued": PaymentAccruedPayload;
  readonly "payroll.accrual.insufficient-balance": AccrualInsufficientBalancePayload;
  readonly "payroll.withdrawal.transferred": WithdrawalTransferredPayload;
  readonly "payroll.withdrawal.insufficient-balance": WithdrawalInsufficientBalancePayload;
  readonly "payroll.funds.swept": FundsSweptPayload;
  readonly "payroll.ownership.transferred": OwnershipTransferredPayload;
};

/**
 * A payroll event before it is wrapped with metadata, discriminated by `type`.
 */
export type PayrollEvent = {
  readonly [K in PayrollEventType]: {
    readonly type: K;
    readonly payload: PayrollEventPayloads[K];
  };
}[PayrollEventType];
