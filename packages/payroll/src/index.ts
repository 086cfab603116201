/**
 * @cadence/payroll — Interval payroll with keeper-driven settlement
 * and pull-based escrow withdrawals.
 */

// Coordinator
export { Payroll } from "./payroll.js";
export type { PayrollDependencies } from "./payroll.js";

// Components
export { RecipientRegistry } from "./registry.js";
export { ScheduleStore, ZERO_SCHEDULE, isDue, isActive, validateTerms } from "./schedule.js";
export { scanDue } from "./scan.js";
export { settleCandidates, unallocatedBalance } from "./settlement.js";
export { withdrawEscrow, sweepVault } from "./withdrawal.js";
export type { TransferContext } from "./withdrawal.js";
export { encodeSelection, decodeSelection, SELECTION_VERSION } from "./selection.js";
export type { SelectionToken } from "./selection.js";
export {
  PayrollSnapshotSchema,
  parsePayrollSnapshot,
  emptyState,
  restoreState,
} from "./snapshot.js";

// Collaborators
export { OwnerGate, requireAddress } from "./access.js";
export { SystemClock, ManualClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { InMemoryTransport } from "./transport.js";
export type {
  FundsTransport,
  TransferResult,
  TransferRecord,
  TransferHook,
} from "./transport.js";

// Errors
export {
  PayrollError,
  InvalidScheduleError,
  InvalidRecipientError,
  DuplicateRecipientError,
  InvalidAmountError,
  InvalidSelectionError,
  InvalidSnapshotError,
  UnauthorizedError,
  WithdrawalFailedError,
} from "./errors.js";
export type { PayrollErrorCode } from "./errors.js";

// Types
export type {
  PayrollState,
  Emit,
  PayrollConfig,
  PayrollReceipt,
  RemovalReceipt,
  DueCheck,
  SettlementOutcome,
  SettlementReport,
  TransferReceipt,
  ScheduleSnapshot,
  PayrollSnapshot,
} from "./types.js";
