/**
 * @cadence/payroll — Snapshot validation and state rebuild.
 *
 * Snapshots are plain JSON (bigints as decimal strings) so they can be
 * written to disk and read back. Input is untrusted and parsed with zod.
 */

import { z } from "zod";
import { isAddress } from "@cadence/types";
import { ContractVault, EscrowLedger, parseRaw } from "@cadence/ledger";
import { InvalidSnapshotError } from "./errors.js";
import { RecipientRegistry } from "./registry.js";
import { ScheduleStore } from "./schedule.js";
import type { PayrollSnapshot, PayrollState } from "./types.js";

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value), { message: "Invalid address" })
  .transform((value) => value.toLowerCase());

const RawAmountSchema = z.string().regex(/^\d+$/, "Amount must be an unsigned integer string");

const SecondsSchema = z.number().int().nonnegative();

function hasUniqueRecipients(entries: readonly { recipient: string }[]): boolean {
  return new Set(entries.map((entry) => entry.recipient)).size === entries.length;
}

export const PayrollSnapshotSchema = z.object({
  version: z.literal(1),
  address: AddressSchema,
  owner: AddressSchema,
  schedules: z
    .array(
      z.object({
        recipient: AddressSchema,
        amount: RawAmountSchema.refine((value) => !/^0+$/.test(value), {
          message: "Scheduled amount must be positive",
        }),
        interval: z.number().int().positive(),
        lastTimestamp: SecondsSchema,
      }),
    )
    .refine(hasUniqueRecipients, { message: "Duplicate recipient in schedules" }),
  ledger: z.object({
    version: z.literal(1),
    contractBalance: RawAmountSchema,
    escrow: z
      .array(
        z.object({
          recipient: AddressSchema,
          balance: RawAmountSchema,
        }),
      )
      .refine(hasUniqueRecipients, { message: "Duplicate recipient in escrow" }),
  }),
  asOf: SecondsSchema,
});

/**
 * @throws InvalidSnapshotError listing every schema issue
 */
export function parsePayrollSnapshot(input: unknown): PayrollSnapshot {
  const parsed = PayrollSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidSnapshotError(`Invalid payroll snapshot: ${issues}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function emptyState(): PayrollState {
  return {
    registry: new RecipientRegistry(),
    schedules: new ScheduleStore(),
    escrow: new EscrowLedger(),
    vault: new ContractVault(),
  };
}

export function restoreState(snapshot: PayrollSnapshot): PayrollState {
  const schedules = new ScheduleStore();
  schedules.restore(
    snapshot.schedules.map((entry) => ({
      recipient: entry.recipient,
      schedule: {
        amount: parseRaw(entry.amount),
        interval: entry.interval,
        lastTimestamp: entry.lastTimestamp,
      },
    })),
  );

  return {
    registry: new RecipientRegistry(snapshot.schedules.map((entry) => entry.recipient)),
    schedules,
    escrow: EscrowLedger.fromEntries(snapshot.ledger.escrow),
    vault: new ContractVault(parseRaw(snapshot.ledger.contractBalance)),
  };
}
