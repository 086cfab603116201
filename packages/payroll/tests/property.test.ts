/**
 * Property-Based Tests for @cadence/payroll
 *
 * Uses fast-check to verify invariants over arbitrary operation sequences:
 *
 * 1. Escrow never exceeds the contract balance (no sweeps involved)
 * 2. Duplicated candidates settle exactly like the deduplicated list
 * 3. Removal preserves the relative order of the remaining recipients
 * 4. Registry membership and active schedules always agree
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Payroll } from "../src/payroll.js";
import { ManualClock } from "../src/clock.js";
import { InMemoryTransport } from "../src/transport.js";

// =============================================================================
// Arbitraries
// =============================================================================

const SELF = "0x00000000000000000000000000000000000c0ffe";
const OWNER = "0x00000000000000000000000000000000000000aa";

/** A small pool so sequences collide on the same recipients. */
const POOL = Array.from(
  { length: 6 },
  (_, i) => `0x${(i + 1).toString(16).padStart(40, "0")}`,
);

const arbRecipient = fc.constantFrom(...POOL);

type Op =
  | { readonly kind: "deposit"; readonly amount: bigint }
  | { readonly kind: "add"; readonly recipient: string; readonly amount: bigint; readonly interval: number }
  | { readonly kind: "remove"; readonly recipient: string }
  | { readonly kind: "tick"; readonly seconds: number }
  | { readonly kind: "settle" }
  | { readonly kind: "withdraw"; readonly recipient: string };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("deposit" as const), amount: fc.bigInt({ min: 1n, max: 50n }) }),
  fc.record({
    kind: fc.constant("add" as const),
    recipient: arbRecipient,
    amount: fc.bigInt({ min: 1n, max: 20n }),
    interval: fc.integer({ min: 1, max: 60 }),
  }),
  fc.record({ kind: fc.constant("remove" as const), recipient: arbRecipient }),
  fc.record({ kind: fc.constant("tick" as const), seconds: fc.integer({ min: 0, max: 90 }) }),
  fc.record({ kind: fc.constant("settle" as const) }),
  fc.record({ kind: fc.constant("withdraw" as const), recipient: arbRecipient }),
);

function fresh(): { payroll: Payroll; clock: ManualClock } {
  const clock = new ManualClock(0);
  const payroll = new Payroll({
    address: SELF,
    owner: OWNER,
    transport: new InMemoryTransport(),
    clock,
  });
  return { payroll, clock };
}

function apply(payroll: Payroll, clock: ManualClock, op: Op): void {
  switch (op.kind) {
    case "deposit":
      payroll.deposit(op.amount);
      break;
    case "add":
      if (payroll.getPaymentSchedule(op.recipient).amount === 0n) {
        payroll.addRecipient(OWNER, op.recipient, op.amount, op.interval);
      }
      break;
    case "remove":
      payroll.removeRecipient(OWNER, op.recipient);
      break;
    case "tick":
      clock.advance(op.seconds);
      break;
    case "settle":
      payroll.settle(payroll.checkDue().token);
      break;
    case "withdraw":
      payroll.withdraw(op.recipient);
      break;
  }
}

function totalEscrow(payroll: Payroll): bigint {
  return POOL.reduce((sum, r) => sum + payroll.getEscrowBalance(r), 0n);
}

// =============================================================================
// Properties
// =============================================================================

describe("payroll properties", () => {
  it("escrow never exceeds the contract balance", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 60 }), (ops) => {
        const { payroll, clock } = fresh();
        for (const op of ops) {
          apply(payroll, clock, op);
          expect(totalEscrow(payroll)).toBeLessThanOrEqual(payroll.getContractBalance());
        }
      }),
    );
  });

  it("registry membership matches active schedules", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 60 }), (ops) => {
        const { payroll, clock } = fresh();
        for (const op of ops) {
          apply(payroll, clock, op);
        }
        const listed = payroll.getRecipients();
        for (const recipient of POOL) {
          const active = payroll.getPaymentSchedule(recipient).amount > 0n;
          expect(listed.includes(recipient)).toBe(active);
        }
        expect(new Set(listed).size).toBe(listed.length);
      }),
    );
  });

  it("duplicated candidates settle like the deduplicated list", () => {
    fc.assert(
      fc.property(
        fc.array(arbOp, { maxLength: 30 }),
        fc.array(arbRecipient, { maxLength: 12 }),
        (ops, candidates) => {
          const left = fresh();
          const right = fresh();
          for (const op of ops) {
            apply(left.payroll, left.clock, op);
            apply(right.payroll, right.clock, op);
          }

          left.payroll.settleCandidates(candidates);
          right.payroll.settleCandidates([...new Set(candidates)]);

          const { asOf: _l, ...l } = left.payroll.snapshot();
          const { asOf: _r, ...r } = right.payroll.snapshot();
          expect(l).toEqual(r);
        },
      ),
    );
  });

  it("removal keeps the relative order of everyone else", () => {
    fc.assert(
      fc.property(
        fc.shuffledSubarray(POOL, { minLength: 1 }),
        fc.nat(),
        (order, pick) => {
          const { payroll } = fresh();
          for (const recipient of order) {
            payroll.addRecipient(OWNER, recipient, 1n, 10);
          }
          const victim = order[pick % order.length];
          if (victim === undefined) return;

          payroll.removeRecipient(OWNER, victim);

          expect(payroll.getRecipients()).toEqual(order.filter((r) => r !== victim));
        },
      ),
    );
  });
});
