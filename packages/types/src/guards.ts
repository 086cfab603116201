/**
 * Runtime Type Guards
 *
 * Used where values cross a trust boundary: selection tokens, snapshots,
 * configuration and events handed to a store.
 */

import type { Address, PaymentSchedule } from "./payroll.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isWholeSeconds(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// ─── Addresses ───────────────────────────────────────────────────────────

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/** 0x-prefixed, 20 bytes of hex, any case. */
export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Lowercase form of a valid address, or undefined if `value` is not one.
 */
export function normalizeAddress(value: unknown): Address | undefined {
  return isAddress(value) ? value.toLowerCase() : undefined;
}

// ─── Schedules ───────────────────────────────────────────────────────────

/** Accepts the zero sentinel as well as live schedules. */
export function isPaymentSchedule(value: unknown): value is PaymentSchedule {
  return (
    isRecord(value) &&
    typeof value["amount"] === "bigint" &&
    value["amount"] >= 0n &&
    isWholeSeconds(value["interval"]) &&
    isWholeSeconds(value["lastTimestamp"])
  );
}

// ─── Events ──────────────────────────────────────────────────────────────

const EVENT_SOURCES: ReadonlySet<string> = new Set<EventSource>(["payroll"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  const { eventId, timestamp, actor, correlationId, source } = value;
  return (
    [eventId, timestamp, actor, correlationId].every((field) => typeof field === "string") &&
    isEventSource(source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  return (
    isRecord(value) &&
    typeof value["type"] === "string" &&
    value["type"].length > 0 &&
    isEventMetadata(value["metadata"]) &&
    isRecord(value["payload"])
  );
}
