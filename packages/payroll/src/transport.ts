/**
 * @cadence/payroll — Funds transport.
 *
 * The fallible external call that moves funds out of the payroll.
 * A transport reports refusal by returning `{ ok: false }`; a thrown
 * error is treated the same way by the caller.
 *
 * Transports are synchronous. A transport may call back into the
 * payroll before it returns (the reentrancy case withdrawal guards).
 */

import type { Address } from "@cadence/types";

export type TransferResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: string };

export interface FundsTransport {
  transfer(from: Address, to: Address, amount: bigint): TransferResult;
}

export interface TransferRecord {
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

/**
 * Hook run before a transfer lands. Receives the transfer being made.
 */
export type TransferHook = (transfer: TransferRecord) => void;

/**
 * In-process transport that keeps receiving balances in a map.
 *
 * Receivers can be told to refuse funds, and a hook can run inside the
 * transfer to simulate a receiver that calls back into the payroll.
 */
export class InMemoryTransport implements FundsTransport {
  private readonly _balances = new Map<Address, bigint>();
  private readonly _refusing = new Set<Address>();
  private readonly _history: TransferRecord[] = [];
  private _hook: TransferHook | undefined;

  transfer(from: Address, to: Address, amount: bigint): TransferResult {
    if (this._refusing.has(to)) {
      return { ok: false, reason: "receiver refused the transfer" };
    }

    const record: TransferRecord = { from, to, amount };
    this._hook?.(record);

    this._balances.set(to, this.balanceOf(to) + amount);
    this._history.push(record);
    return { ok: true };
  }

  balanceOf(address: Address): bigint {
    return this._balances.get(address) ?? 0n;
  }

  refuse(address: Address): void {
    this._refusing.add(address);
  }

  accept(address: Address): void {
    this._refusing.delete(address);
  }

  onTransfer(hook: TransferHook | undefined): void {
    this._hook = hook;
  }

  history(): readonly TransferRecord[] {
    return [...this._history];
  }
}
