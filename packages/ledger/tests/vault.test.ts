/**
 * Tests for ContractVault — total funds held.
 */

import { describe, it, expect } from "vitest";
import { ContractVault } from "../src/vault.js";
import { LedgerError } from "../src/types.js";

describe("ContractVault", () => {
  it("starts empty by default", () => {
    expect(new ContractVault().balance()).toBe(0n);
  });

  it("accepts an initial balance", () => {
    expect(new ContractVault(50n).balance()).toBe(50n);
  });

  it("rejects a negative initial balance", () => {
    expect(() => new ContractVault(-1n)).toThrow(LedgerError);
  });

  it("deposits raise the balance", () => {
    const vault = new ContractVault();
    expect(vault.deposit(10n)).toBe(10n);
    expect(vault.deposit(5n)).toBe(15n);
  });

  it("rejects non-positive deposits", () => {
    const vault = new ContractVault();
    expect(() => vault.deposit(0n)).toThrow("Deposit amount must be positive, got 0");
  });

  it("covers compares against the live balance", () => {
    const vault = new ContractVault(10n);
    expect(vault.covers(10n)).toBe(true);
    expect(vault.covers(11n)).toBe(false);
  });

  it("debit lowers the balance", () => {
    const vault = new ContractVault(10n);
    expect(vault.debit(4n)).toBe(6n);
  });

  it("debit beyond the balance throws INSUFFICIENT_FUNDS and changes nothing", () => {
    const vault = new ContractVault(3n);
    try {
      vault.debit(4n);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("INSUFFICIENT_FUNDS");
    }
    expect(vault.balance()).toBe(3n);
  });

  it("refund puts funds back", () => {
    const vault = new ContractVault(10n);
    vault.debit(10n);
    expect(vault.refund(10n)).toBe(10n);
  });

  it("drain empties the vault and returns the previous balance", () => {
    const vault = new ContractVault(42n);
    expect(vault.drain()).toBe(42n);
    expect(vault.balance()).toBe(0n);
    expect(vault.drain()).toBe(0n);
  });
});
