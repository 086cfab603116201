/**
 * @cadence/payroll — Withdrawals.
 *
 * Recipient withdrawal order is fixed:
 *   snapshot → zero escrow → debit vault → transfer → restore on failure
 *
 * Escrow is zeroed before the transport runs, so a transport that calls
 * withdraw again for the same recipient finds nothing to pay.
 */

import type { Address } from "@cadence/types";
import { PAYROLL_EVENTS } from "@cadence/event-store";
import { WithdrawalFailedError } from "./errors.js";
import type { FundsTransport, TransferResult } from "./transport.js";
import type { Emit, PayrollState } from "./types.js";

export interface TransferContext {
  /** The payroll's own address */
  readonly address: Address;
  readonly transport: FundsTransport;
}

/**
 * Pay out the recipient's whole escrow balance.
 *
 * Returns the amount paid: 0n when there was nothing owed, or when the
 * live vault balance cannot cover it (an event is emitted in that case).
 *
 * @throws WithdrawalFailedError if the transfer fails; escrow and vault are restored
 */
export function withdrawEscrow(
  state: Pick<PayrollState, "escrow" | "vault">,
  context: TransferContext,
  recipient: Address,
  emit: Emit,
): bigint {
  const owed = state.escrow.balanceOf(recipient);
  if (owed === 0n) {
    return 0n;
  }

  if (!state.vault.covers(owed)) {
    emit({
      type: PAYROLL_EVENTS.WITHDRAWAL_INSUFFICIENT_BALANCE,
      payload: {
        recipient,
        required: owed.toString(),
        available: state.vault.balance().toString(),
      },
    });
    return 0n;
  }

  const held = state.escrow.release(recipient);
  state.vault.debit(held);

  transferOrRollback(context, recipient, held, () => {
    state.escrow.restore(recipient, held);
    state.vault.refund(held);
  });

  emit({
    type: PAYROLL_EVENTS.WITHDRAWAL_TRANSFERRED,
    payload: { from: context.address, to: recipient, amount: held.toString() },
  });
  return held;
}

/**
 * Send the entire vault to `to`, ignoring escrow.
 *
 * @throws WithdrawalFailedError if the transfer fails; the vault is restored
 */
export function sweepVault(
  state: Pick<PayrollState, "vault">,
  context: TransferContext,
  to: Address,
  emit: Emit,
): bigint {
  const amount = state.vault.drain();

  transferOrRollback(context, to, amount, () => {
    state.vault.refund(amount);
  });

  emit({
    type: PAYROLL_EVENTS.FUNDS_SWEPT,
    payload: { to, amount: amount.toString() },
  });
  return amount;
}

function transferOrRollback(
  context: TransferContext,
  to: Address,
  amount: bigint,
  rollback: () => void,
): void {
  let result: TransferResult;
  try {
    result = context.transport.transfer(context.address, to, amount);
  } catch (err) {
    rollback();
    const reason = err instanceof Error ? err.message : String(err);
    throw new WithdrawalFailedError(to, amount, reason, { cause: err });
  }

  if (!result.ok) {
    rollback();
    throw new WithdrawalFailedError(to, amount, result.reason);
  }
}
