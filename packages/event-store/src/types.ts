/**
 * @cadence/event-store — Core types.
 *
 * One store-wide log, split into streams. Every event gets two
 * coordinates when it is stored:
 * - `position`: 1-based, contiguous across the whole store
 * - `version`: 1-based, contiguous within its stream
 *
 * Stored events are linked into a single SHA-256 hash chain in
 * position order, so history can be checked for tampering.
 */

import type { DomainEvent } from "@cadence/types";

// =============================================================================
// Stored Event
// =============================================================================

export interface StoredEvent {
  readonly position: number;
  readonly streamId: string;
  readonly version: number;
  /** ISO 8601, set by the store (not by the emitter) */
  readonly recordedAt: string;
  readonly event: DomainEvent;
  /** Hash of the event stored at `position - 1`, or GENESIS_HASH */
  readonly previousHash: string;
  readonly hash: string;
}

/** What the hash covers: everything but the hash itself. */
export type HashedContent = Omit<StoredEvent, "hash">;

// =============================================================================
// Append
// =============================================================================

export interface AppendOptions {
  /**
   * Optimistic concurrency: the stream must be at exactly this version.
   * Use 0 for "stream must not exist yet".
   */
  readonly expectedVersion?: number;
}

export interface AppendResult {
  readonly streamId: string;
  readonly firstVersion: number;
  readonly lastVersion: number;
  readonly firstPosition: number;
  readonly lastPosition: number;
}

// =============================================================================
// Read / Subscribe
// =============================================================================

export interface EventFilter {
  /** Only events of this stream */
  readonly streamId?: string;
  /** Only events at or after this store position */
  readonly fromPosition?: number;
  /** Only events at or after this stream version (requires `streamId`) */
  readonly fromVersion?: number;
  /** Only events whose type is listed */
  readonly types?: readonly string[];
}

/** Synchronous; runs inside `append()`. */
export type EventHandler = (stored: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export type ChainBreakKind =
  /** `position` does not follow its predecessor */
  | "sequence"
  /** `previousHash` does not match the predecessor's hash */
  | "link"
  /** `hash` does not match the recomputed content hash */
  | "hash";

export interface ChainBreak {
  readonly position: number;
  readonly kind: ChainBreakKind;
  readonly expected: string;
  readonly actual: string;
}

export interface IntegrityReport {
  readonly valid: boolean;
  /** Events checked before the first break (all of them when valid) */
  readonly verified: number;
  readonly firstBreak?: ChainBreak;
}

/** The newest stored event's coordinates. */
export interface ChainHead {
  /** 0 for an empty store */
  readonly position: number;
  readonly hash: string;
}

// =============================================================================
// Store
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Stored events never change and are never removed
 * - A batch is appended whole or not at all
 * - Handlers see events in position order
 */
export interface EventStore {
  /**
   * @throws EventStoreError on an empty batch, a malformed event or a version conflict
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events matching `filter`, in position order. */
  read(filter?: EventFilter): readonly StoredEvent[];

  subscribe(handler: EventHandler, filter?: EventFilter): Subscription;

  /** Version of the stream's newest event, or 0. */
  streamVersion(streamId: string): number;

  head(): ChainHead;

  verifyIntegrity(): IntegrityReport;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "VERSION_CONFLICT"
  | "INVALID_STREAM_ID"
  | "INVALID_EVENT"
  | "INVALID_FILTER"
  | "EMPTY_APPEND";

export class EventStoreError extends Error {
  public readonly code: EventStoreErrorCode;
  public readonly streamId: string | undefined;

  constructor(code: EventStoreErrorCode, message: string, streamId?: string) {
    super(message);
    this.name = "EventStoreError";
    this.code = code;
    this.streamId = streamId;
  }
}
