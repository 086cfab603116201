/**
 * @cadence/types — Shared domain types for the Cadence stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Payroll types
export type {
  Address,
  PaymentSchedule,
  RecipientSchedule,
} from "./payroll.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  normalizeAddress,
  isPaymentSchedule,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
