/**
 * @cadence/payroll — Settlement phase.
 *
 * Consumes a candidate list that may be stale, forged, or full of
 * duplicates and unknown addresses. Each candidate is re-checked with
 * `isDue` against live state; anything not due is skipped without an
 * event. One bad candidate never stops the rest of the batch.
 *
 * Per due candidate, in list order:
 * 1. If its amount exceeds the unallocated balance (vault minus escrow),
 *    emit an insufficient-balance event and leave the schedule alone, so
 *    the payment stays due and is retried on the next pass.
 * 2. Otherwise advance lastTimestamp to `now`, then credit escrow.
 *
 * Advancing before crediting means a later duplicate of the same
 * recipient is no longer due: at most one credit per recipient per call.
 */

import type { Address } from "@cadence/types";
import { normalizeAddress } from "@cadence/types";
import { PAYROLL_EVENTS } from "@cadence/event-store";
import { isDue } from "./schedule.js";
import type { Emit, PayrollState, SettlementOutcome } from "./types.js";

/**
 * Funds not yet claimed by any escrow balance. Never negative, even
 * after an admin sweep has left escrow larger than the vault.
 */
export function unallocatedBalance(state: Pick<PayrollState, "escrow" | "vault">): bigint {
  const gap = state.vault.balance() - state.escrow.total();
  return gap > 0n ? gap : 0n;
}

export function settleCandidates(
  state: PayrollState,
  candidates: readonly string[],
  now: number,
  emit: Emit,
): SettlementOutcome {
  const accrued: Address[] = [];
  const underfunded: Address[] = [];
  let skipped = 0;

  for (const candidate of candidates) {
    const recipient = normalizeAddress(candidate);
    if (recipient === undefined || underfunded.includes(recipient)) {
      skipped++;
      continue;
    }

    const schedule = state.schedules.get(recipient);
    if (!isDue(schedule, now)) {
      skipped++;
      continue;
    }

    const available = unallocatedBalance(state);
    if (schedule.amount > available) {
      underfunded.push(recipient);
      emit({
        type: PAYROLL_EVENTS.ACCRUAL_INSUFFICIENT_BALANCE,
        payload: {
          recipient,
          required: schedule.amount.toString(),
          available: available.toString(),
        },
      });
      continue;
    }

    state.schedules.advance(recipient, now);
    const escrowBalance = state.escrow.credit(recipient, schedule.amount);
    accrued.push(recipient);
    emit({
      type: PAYROLL_EVENTS.PAYMENT_ACCRUED,
      payload: {
        recipient,
        amount: schedule.amount.toString(),
        escrowBalance: escrowBalance.toString(),
        timestamp: now,
      },
    });
  }

  return { accrued, underfunded, skipped };
}
