/**
 * Tests for config.ts — parseRecipients + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { LedgerError } from "@cadence/ledger";
import { parseRecipients, loadConfig } from "../src/config.js";

const SELF = "0x00000000000000000000000000000000000c0ffe";
const OWNER = "0x00000000000000000000000000000000000000aa";
const ALICE = "0x00000000000000000000000000000000000a11ce";
const BOB = "0x0000000000000000000000000000000000000b0b";

// =============================================================================
// parseRecipients
// =============================================================================

describe("parseRecipients", () => {
  it("returns empty array for empty string", () => {
    expect(parseRecipients("", 18)).toEqual([]);
    expect(parseRecipients("   ", 18)).toEqual([]);
  });

  it("parses a single entry, scaling the amount", () => {
    expect(parseRecipients(`${ALICE}:1.5:86400`, 6)).toEqual([
      { recipient: ALICE, amount: 1_500_000n, interval: 86400 },
    ]);
  });

  it("parses multiple comma-separated entries in order", () => {
    const recipients = parseRecipients(` ${ALICE}:1:30 , ${BOB}:2:60 `, 0);
    expect(recipients).toEqual([
      { recipient: ALICE, amount: 1n, interval: 30 },
      { recipient: BOB, amount: 2n, interval: 60 },
    ]);
  });

  it("lowercases addresses", () => {
    const [parsed] = parseRecipients("0x00000000000000000000000000000000000A11CE:1:1", 0);
    expect(parsed?.recipient).toBe(ALICE);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseRecipients("badentry", 0)).toThrow("Invalid RECIPIENTS entry");
    expect(() => parseRecipients(`${ALICE}:1`, 0)).toThrow("Invalid RECIPIENTS entry");
    expect(() => parseRecipients(`${ALICE}:1:2:3`, 0)).toThrow("Invalid RECIPIENTS entry");
  });

  it("throws on an invalid address", () => {
    expect(() => parseRecipients("alice:1:30", 0)).toThrow('Invalid address "alice" in RECIPIENTS');
  });

  it("throws on a duplicate address", () => {
    expect(() => parseRecipients(`${ALICE}:1:30,${ALICE}:2:30`, 0)).toThrow(
      `Duplicate address "${ALICE}" in RECIPIENTS`,
    );
  });

  it("throws on a zero or malformed amount", () => {
    expect(() => parseRecipients(`${ALICE}:0:30`, 0)).toThrow("must be positive");
    expect(() => parseRecipients(`${ALICE}:abc:30`, 0)).toThrow(LedgerError);
    expect(() => parseRecipients(`${ALICE}:0.001:30`, 2)).toThrow("decimal places");
  });

  it("throws on a zero or fractional interval", () => {
    expect(() => parseRecipients(`${ALICE}:1:0`, 0)).toThrow("positive whole number of seconds");
    expect(() => parseRecipients(`${ALICE}:1:1.5`, 0)).toThrow("positive whole number of seconds");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  const required = { PAYROLL_ADDRESS: SELF, PAYROLL_OWNER: OWNER };

  it("returns defaults when only the addresses are set", () => {
    expect(loadConfig(required)).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      PAYROLL_ADDRESS: SELF,
      PAYROLL_OWNER: OWNER,
      UNIT_DECIMALS: 18,
      INITIAL_DEPOSIT: "0",
      RECIPIENTS: "",
      KEEPER_INTERVAL_MS: 15000,
    });
  });

  it("coerces numeric values from strings", () => {
    const config = loadConfig({ ...required, KEEPER_INTERVAL_MS: "2500", UNIT_DECIMALS: "6" });
    expect(config.KEEPER_INTERVAL_MS).toBe(2500);
    expect(config.UNIT_DECIMALS).toBe(6);
  });

  it("lowercases addresses", () => {
    const config = loadConfig({
      ...required,
      PAYROLL_OWNER: "0x00000000000000000000000000000000000000AA",
    });
    expect(config.PAYROLL_OWNER).toBe(OWNER);
  });

  it("requires the owner", () => {
    expect(() => loadConfig({ PAYROLL_ADDRESS: SELF })).toThrow();
  });

  it("rejects a malformed owner", () => {
    expect(() => loadConfig({ ...required, PAYROLL_OWNER: "owner" })).toThrow(
      "Must be a 0x-prefixed 20-byte hex address",
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ ...required, LOG_LEVEL: "verbose" })).toThrow();
  });

  it("rejects a negative initial deposit", () => {
    expect(() => loadConfig({ ...required, INITIAL_DEPOSIT: "-1" })).toThrow(
      "Must be a non-negative decimal amount",
    );
  });

  it("rejects a keeper interval below 100ms", () => {
    expect(() => loadConfig({ ...required, KEEPER_INTERVAL_MS: "10" })).toThrow();
  });
});
