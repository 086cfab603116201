/**
 * Payroll — Top-level coordinator for interval payments.
 *
 * Composes:
 * - RecipientRegistry + ScheduleStore: who is paid, how much, how often
 * - scanDue / settleCandidates: the two-phase keeper protocol
 * - EscrowLedger + ContractVault: what is owed and what is held
 * - OwnerGate: the privileged capability
 *
 * Every entry point is synchronous and runs to completion before any
 * other call can observe state. Events a call emits are appended to the
 * event store as one batch after the call's state changes are done, and
 * are returned in the call's receipt.
 */

import { randomUUID } from "node:crypto";
import type { Address, DomainEvent, PaymentSchedule } from "@cadence/types";
import { normalizeAddress } from "@cadence/types";
import { PAYROLL_EVENTS } from "@cadence/event-store";
import type { EventStore, PayrollEvent } from "@cadence/event-store";
import { OwnerGate, requireAddress } from "./access.js";
import { SystemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { DuplicateRecipientError, InvalidAmountError } from "./errors.js";
import { scanDue } from "./scan.js";
import { ZERO_SCHEDULE, validateTerms } from "./schedule.js";
import { decodeSelection, encodeSelection } from "./selection.js";
import type { SelectionToken } from "./selection.js";
import { settleCandidates, unallocatedBalance } from "./settlement.js";
import { emptyState, parsePayrollSnapshot, restoreState } from "./snapshot.js";
import type { FundsTransport } from "./transport.js";
import { sweepVault, withdrawEscrow } from "./withdrawal.js";
import type { TransferContext } from "./withdrawal.js";
import type {
  DueCheck,
  Emit,
  PayrollConfig,
  PayrollReceipt,
  PayrollSnapshot,
  PayrollState,
  RemovalReceipt,
  SettlementReport,
  TransferReceipt,
} from "./types.js";

/** Collaborators needed to bring a snapshot back to life. */
export type PayrollDependencies = Omit<PayrollConfig, "address" | "owner">;

const ANONYMOUS = "anonymous";

// =============================================================================
// Payroll
// =============================================================================

export class Payroll {
  private readonly address: Address;
  private readonly gate: OwnerGate;
  private readonly transport: FundsTransport;
  private readonly clock: Clock;
  private readonly eventStore: EventStore | undefined;
  private readonly state: PayrollState;

  constructor(config: PayrollConfig, state: PayrollState = emptyState()) {
    this.address = requireAddress(config.address);
    this.gate = new OwnerGate(config.owner);
    this.transport = config.transport;
    this.clock = config.clock ?? new SystemClock();
    this.eventStore = config.eventStore;
    this.state = state;
  }

  /** Event store stream this payroll appends to. */
  get streamId(): string {
    return `payroll:${this.address}`;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Funding
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Add funds to the contract balance. Open to anyone.
   * Returns the new contract balance.
   */
  deposit(amount: bigint): bigint {
    if (amount <= 0n) {
      throw new InvalidAmountError(`Deposit amount must be positive, got ${amount.toString()}`);
    }
    return this.state.vault.deposit(amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Registry
  // ───────────────────────────────────────────────────────────────────────

  addRecipient(
    caller: string,
    recipient: string,
    amount: bigint,
    interval: number,
  ): PayrollReceipt {
    this.gate.assertPrivileged(caller, "add recipients");
    const address = requireAddress(recipient);
    validateTerms(amount, interval);
    if (this.state.schedules.hasActive(address)) {
      throw new DuplicateRecipientError(address);
    }

    return this.record(caller, (emit) => {
      const now = this.clock.now();
      this.state.registry.append(address);
      this.state.schedules.create(address, amount, interval, now);
      emit({
        type: PAYROLL_EVENTS.RECIPIENT_ADDED,
        payload: {
          recipient: address,
          amount: amount.toString(),
          interval,
          lastTimestamp: now,
        },
      });
    }).receipt;
  }

  /**
   * Remove a recipient and delete its schedule. Unknown recipients are a
   * silent no-op. Escrow is untouched: anything accrued stays withdrawable.
   */
  removeRecipient(caller: string, recipient: string): RemovalReceipt {
    this.gate.assertPrivileged(caller, "remove recipients");
    const address = normalizeAddress(recipient);

    const { result, receipt } = this.record(caller, (emit) => {
      if (address === undefined || !this.state.registry.remove(address)) {
        return false;
      }
      this.state.schedules.delete(address);
      emit({
        type: PAYROLL_EVENTS.RECIPIENT_REMOVED,
        payload: { recipient: address },
      });
      return true;
    });

    return { ...receipt, removed: result };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Keeper protocol
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Read-only scan for due payments. Safe to call at any time.
   */
  checkDue(): DueCheck {
    const candidates = scanDue(this.state, this.clock.now());
    return {
      hasDue: candidates.length > 0,
      candidates,
      token: encodeSelection(candidates),
    };
  }

  /**
   * Settle a token produced by `checkDue()` (or by anyone else).
   *
   * @throws InvalidSelectionError if the token cannot be decoded; nothing changes
   */
  settle(token: SelectionToken, caller: string = ANONYMOUS): SettlementReport {
    return this.settleCandidates(decodeSelection(token), caller);
  }

  settleCandidates(
    candidates: readonly string[],
    caller: string = ANONYMOUS,
  ): SettlementReport {
    const { result, receipt } = this.record(caller, (emit) =>
      settleCandidates(this.state, candidates, this.clock.now(), emit),
    );
    return { ...receipt, ...result };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay the caller its escrow balance.
   *
   * @throws WithdrawalFailedError if the transfer fails; the balance is kept
   */
  withdraw(caller: string): TransferReceipt {
    const recipient = requireAddress(caller);
    const { result, receipt } = this.record(recipient, (emit) =>
      withdrawEscrow(this.state, this.transferContext(), recipient, emit),
    );
    return { ...receipt, amount: result };
  }

  /**
   * Sweep the whole contract balance to the owner. Escrow is not consulted.
   *
   * @throws WithdrawalFailedError if the transfer fails; the balance is kept
   */
  adminWithdraw(caller: string): TransferReceipt {
    this.gate.assertPrivileged(caller, "sweep the contract balance");
    const to = requireAddress(caller);
    const { result, receipt } = this.record(to, (emit) =>
      sweepVault(this.state, this.transferContext(), to, emit),
    );
    return { ...receipt, amount: result };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Ownership
  // ───────────────────────────────────────────────────────────────────────

  getOwner(): Address {
    return this.gate.owner();
  }

  transferOwnership(caller: string, next: string): PayrollReceipt {
    return this.record(caller, (emit) => {
      const previousOwner = this.gate.transferOwnership(caller, next);
      emit({
        type: PAYROLL_EVENTS.OWNERSHIP_TRANSFERRED,
        payload: { previousOwner, newOwner: this.gate.owner() },
      });
    }).receipt;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getAddress(): Address {
    return this.address;
  }

  /** The zero sentinel for anyone without an active schedule. */
  getPaymentSchedule(recipient: string): PaymentSchedule {
    const address = normalizeAddress(recipient);
    return address === undefined ? ZERO_SCHEDULE : this.state.schedules.get(address);
  }

  getRecipients(): readonly Address[] {
    return this.state.registry.list();
  }

  getEscrowBalance(recipient: string): bigint {
    const address = normalizeAddress(recipient);
    return address === undefined ? 0n : this.state.escrow.balanceOf(address);
  }

  getContractBalance(): bigint {
    return this.state.vault.balance();
  }

  /** Contract balance not yet claimed by escrow. */
  getUnallocatedBalance(): bigint {
    return unallocatedBalance(this.state);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): PayrollSnapshot {
    return {
      version: 1,
      address: this.address,
      owner: this.gate.owner(),
      schedules: this.state.registry.list().map((recipient) => {
        const schedule = this.state.schedules.get(recipient);
        return {
          recipient,
          amount: schedule.amount.toString(),
          interval: schedule.interval,
          lastTimestamp: schedule.lastTimestamp,
        };
      }),
      ledger: {
        version: 1,
        contractBalance: this.state.vault.balance().toString(),
        escrow: this.state.escrow.entries(),
      },
      asOf: this.clock.now(),
    };
  }

  /**
   * Rebuild a payroll from `snapshot()` output (typically parsed JSON).
   *
   * @throws InvalidSnapshotError if the input does not match the snapshot schema
   */
  static fromSnapshot(input: unknown, dependencies: PayrollDependencies): Payroll {
    const snapshot = parsePayrollSnapshot(input);
    return new Payroll(
      { ...dependencies, address: snapshot.address, owner: snapshot.owner },
      restoreState(snapshot),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private transferContext(): TransferContext {
    return { address: this.address, transport: this.transport };
  }

  /**
   * Run `body`, collecting what it emits. If it throws, nothing is recorded.
   */
  private record<T>(
    actor: string,
    body: (emit: Emit) => T,
  ): { readonly result: T; readonly receipt: PayrollReceipt } {
    const correlationId = randomUUID();
    const events: PayrollEvent[] = [];
    const result = body((event) => {
      events.push(event);
    });

    if (events.length > 0 && this.eventStore !== undefined) {
      const timestamp = new Date(this.clock.now() * 1000).toISOString();
      this.eventStore.append(
        this.streamId,
        events.map((event, i): DomainEvent => ({
          type: event.type,
          metadata: {
            eventId: `${correlationId}:${i}`,
            timestamp,
            actor,
            correlationId,
            source: "payroll",
          },
          payload: event.payload,
        })),
      );
    }

    return { result, receipt: { correlationId, events } };
  }
}
