/**
 * @cadence/ledger — Escrow ledger.
 *
 * Tracks what each recipient has accrued but not yet withdrawn.
 * The ledger knows nothing about schedules or the registry: a recipient
 * removed from payroll keeps its balance here until it withdraws.
 *
 * Rules:
 * - Balances are never negative
 * - Entries are created on first credit and never deleted (they persist at 0n)
 * - The running total always equals the sum of all balances
 */

import type { Address } from "@cadence/types";
import { assertPositive, parseRaw } from "./units.js";
import { LedgerError } from "./types.js";
import type { EscrowEntry } from "./types.js";

export class EscrowLedger {
  private readonly _balances: Map<Address, bigint> = new Map();
  private _total = 0n;

  /**
   * Balance owed to `recipient`; 0n if it never accrued anything.
   */
  balanceOf(recipient: Address): bigint {
    return this._balances.get(recipient) ?? 0n;
  }

  /**
   * Sum of all escrow balances.
   */
  total(): bigint {
    return this._total;
  }

  /**
   * Add `amount` to the recipient's balance. Returns the new balance.
   */
  credit(recipient: Address, amount: bigint): bigint {
    assertPositive(amount, "Credit amount");
    const next = this.balanceOf(recipient) + amount;
    this._balances.set(recipient, next);
    this._total += amount;
    return next;
  }

  /**
   * Zero the recipient's balance and return what it held.
   *
   * Callers that move funds out afterwards must hand the amount back
   * through `restore()` if the transfer fails.
   */
  release(recipient: Address): bigint {
    const held = this.balanceOf(recipient);
    if (held === 0n) {
      return 0n;
    }
    this._balances.set(recipient, 0n);
    this._total -= held;
    return held;
  }

  /**
   * Hand back an amount taken by `release()`.
   *
   * The amount is added rather than assigned, so anything credited
   * between release and restore is kept.
   */
  restore(recipient: Address, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    this.credit(recipient, amount);
  }

  /**
   * Every recipient with an entry, in first-credit order.
   */
  entries(): readonly EscrowEntry[] {
    return [...this._balances].map(([recipient, balance]) => ({
      recipient,
      balance: balance.toString(),
    }));
  }

  /**
   * Rebuild balances from serialized entries. Each recipient may appear once.
   */
  static fromEntries(entries: readonly EscrowEntry[]): EscrowLedger {
    const ledger = new EscrowLedger();
    for (const entry of entries) {
      if (ledger._balances.has(entry.recipient)) {
        throw new LedgerError(
          "DUPLICATE_ENTRY",
          `Escrow entry for ${entry.recipient} appears more than once`,
        );
      }
      const balance = parseRaw(entry.balance);
      ledger._balances.set(entry.recipient, balance);
      ledger._total += balance;
    }
    return ledger;
  }
}
