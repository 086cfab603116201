/**
 * @cadence/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface: one hash-chained log split into streams
 * - InMemoryEventStore for tests and keeper processes
 * - Payroll domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedContent,
  AppendOptions,
  AppendResult,
  EventFilter,
  EventHandler,
  Subscription,
  ChainBreakKind,
  ChainBreak,
  IntegrityReport,
  ChainHead,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { GENESIS_HASH, hashStoredEvent, seal, verifyChain } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { HandlerErrorFn, InMemoryEventStoreOptions } from "./in-memory-store.js";

// Payroll domain events
export { PAYROLL_EVENTS, isPayrollEventType } from "./payroll-events.js";
export type {
  PayrollEventType,
  PayrollEvent,
  PayrollEventPayloads,
  RecipientAddedPayload,
  RecipientRemovedPayload,
  PaymentAccruedPayload,
  AccrualInsufficientBalancePayload,
  WithdrawalTransferredPayload,
  WithdrawalInsufficientBalancePayload,
  FundsSweptPayload,
  OwnershipTransferredPayload,
} from "./payroll-events.js";
