/**
 * @cadence/ledger — Contract vault.
 *
 * The total funds the payroll holds. Deposits raise it; transfers out
 * lower it. Escrow balances are claims on this pool, not a partition
 * of it, so the vault never looks at escrow.
 */

import { LedgerError } from "./types.js";
import { assertNonNegative, assertPositive } from "./units.js";

export class ContractVault {
  private _balance: bigint;

  constructor(initialBalance = 0n) {
    assertNonNegative(initialBalance, "Initial balance");
    this._balance = initialBalance;
  }

  balance(): bigint {
    return this._balance;
  }

  /**
   * Whether the vault holds at least `amount`.
   */
  covers(amount: bigint): boolean {
    return this._balance >= amount;
  }

  deposit(amount: bigint): bigint {
    assertPositive(amount, "Deposit amount");
    this._balance += amount;
    return this._balance;
  }

  /**
   * Take `amount` out of the vault ahead of an external transfer.
   */
  debit(amount: bigint): bigint {
    assertNonNegative(amount, "Debit amount");
    if (amount > this._balance) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Cannot debit ${amount.toString()} from a vault holding ${this._balance.toString()}`,
      );
    }
    this._balance -= amount;
    return this._balance;
  }

  /**
   * Put back an amount taken by `debit()` or `drain()` after a failed transfer.
   */
  refund(amount: bigint): bigint {
    assertNonNegative(amount, "Refund amount");
    this._balance += amount;
    return this._balance;
  }

  /**
   * Empty the vault and return what it held.
   */
  drain(): bigint {
    const held = this._balance;
    this._balance = 0n;
    return held;
  }
}
