/**
 * Tests for the event store hash chain.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@cadence/types";
import { GENESIS_HASH, hashStoredEvent, seal, verifyChain } from "../src/hash-chain.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import type { StoredEvent } from "../src/types.js";

function event(amount: string): DomainEvent {
  return {
    type: "payroll.payment.accrued",
    metadata: {
      eventId: `evt-${amount}`,
      timestamp: "2024-01-01T00:00:00.000Z",
      actor: "keeper",
      correlationId: "corr-1",
      source: "payroll",
    },
    payload: { amount },
  };
}

function chain(...amounts: string[]): StoredEvent[] {
  const s = new InMemoryEventStore({ now: () => new Date(0) });
  s.append("payroll:a", amounts.map(event));
  return [...s.read()];
}

describe("hashStoredEvent", () => {
  const content = {
    position: 1,
    streamId: "payroll:a",
    version: 1,
    recordedAt: "1970-01-01T00:00:00.000Z",
    event: event("10"),
    previousHash: GENESIS_HASH,
  };

  it("produces 64 hex characters", () => {
    expect(hashStoredEvent(content)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores key order", () => {
    const reordered = {
      previousHash: content.previousHash,
      event: content.event,
      recordedAt: content.recordedAt,
      version: content.version,
      streamId: content.streamId,
      position: content.position,
    };
    expect(hashStoredEvent(reordered)).toBe(hashStoredEvent(content));
  });

  it("depends on the previous hash", () => {
    expect(hashStoredEvent({ ...content, previousHash: "f".repeat(64) })).not.toBe(
      hashStoredEvent(content),
    );
  });
});

describe("seal", () => {
  it("attaches the previous hash and the content hash", () => {
    const { previousHash: _p, ...rest } = {
      position: 1,
      streamId: "payroll:a",
      version: 1,
      recordedAt: "1970-01-01T00:00:00.000Z",
      event: event("10"),
      previousHash: GENESIS_HASH,
    };
    const sealed = seal(rest, GENESIS_HASH);
    expect(sealed.previousHash).toBe(GENESIS_HASH);
    expect(sealed.hash).toBe(hashStoredEvent({ ...rest, previousHash: GENESIS_HASH }));
  });
});

describe("verifyChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyChain([])).toEqual({ valid: true, verified: 0 });
  });

  it("accepts an untouched chain", () => {
    expect(verifyChain(chain("1", "2", "3"))).toEqual({ valid: true, verified: 3 });
  });

  it("detects an edited payload", () => {
    const events = chain("1", "2", "3");
    const second = events[1];
    if (second === undefined) throw new Error("fixture");
    events[1] = { ...second, event: { ...second.event, payload: { amount: "2000" } } };

    const report = verifyChain(events);
    expect(report.valid).toBe(false);
    expect(report.verified).toBe(1);
    expect(report.firstBreak).toMatchObject({ position: 2, kind: "hash", actual: second.hash });
  });

  it("detects a dropped event", () => {
    const [first, , third] = chain("1", "2", "3");
    if (first === undefined || third === undefined) throw new Error("fixture");

    expect(verifyChain([first, third]).firstBreak).toEqual({
      position: 3,
      kind: "sequence",
      expected: "2",
      actual: "3",
    });
  });

  it("detects a relinked event", () => {
    const events = chain("1", "2");
    const second = events[1];
    if (second === undefined) throw new Error("fixture");
    const forged = seal(
      {
        position: second.position,
        streamId: second.streamId,
        version: second.version,
        recordedAt: second.recordedAt,
        event: second.event,
      },
      GENESIS_HASH,
    );
    events[1] = forged;

    expect(verifyChain(events).firstBreak).toMatchObject({ position: 2, kind: "link" });
  });

  it("is what the store reports", () => {
    const s = new InMemoryEventStore();
    s.append("payroll:a", [event("1"), event("2")]);
    expect(s.verifyIntegrity()).toEqual({ valid: true, verified: 2 });
  });
});
