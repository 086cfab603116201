/**
 * Tests for OwnerGate — the single-owner privilege check.
 */

import { describe, it, expect } from "vitest";
import { OwnerGate, requireAddress } from "../src/access.js";
import { InvalidRecipientError, UnauthorizedError } from "../src/errors.js";

const OWNER = "0x00000000000000000000000000000000000000aa";
const OTHER = "0x00000000000000000000000000000000000000bb";

describe("OwnerGate", () => {
  it("lets the owner through, whatever the case", () => {
    const gate = new OwnerGate(OWNER);
    expect(() => gate.assertPrivileged(OWNER.toUpperCase().replace("0X", "0x"), "x")).not.toThrow();
  });

  it("rejects anyone else", () => {
    const gate = new OwnerGate(OWNER);
    expect(() => gate.assertPrivileged(OTHER, "add recipients")).toThrow(
      `'${OTHER}' is not allowed to add recipients`,
    );
  });

  it("rejects malformed callers", () => {
    const gate = new OwnerGate(OWNER);
    expect(() => gate.assertPrivileged("owner", "x")).toThrow(UnauthorizedError);
  });

  it("transfers ownership and returns the previous owner", () => {
    const gate = new OwnerGate(OWNER);
    expect(gate.transferOwnership(OWNER, OTHER)).toBe(OWNER);
    expect(gate.owner()).toBe(OTHER);
    expect(() => gate.assertPrivileged(OWNER, "x")).toThrow(UnauthorizedError);
  });

  it("refuses to transfer to a malformed address", () => {
    const gate = new OwnerGate(OWNER);
    expect(() => gate.transferOwnership(OWNER, "nobody")).toThrow(InvalidRecipientError);
    expect(gate.owner()).toBe(OWNER);
  });
});

describe("requireAddress", () => {
  it("lowercases valid addresses", () => {
    expect(requireAddress("0x00000000000000000000000000000000000000AA")).toBe(OWNER);
  });

  it("throws for anything else", () => {
    expect(() => requireAddress("")).toThrow("'' is not a valid address");
  });
});
