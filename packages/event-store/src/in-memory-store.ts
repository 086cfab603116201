/**
 * @cadence/event-store — In-memory EventStore implementation.
 *
 * Suitable for:
 * - Unit and integration tests
 * - Keeper processes that do not need durable history
 *
 * No durability: history lives as long as the process.
 */

import type { DomainEvent } from "@cadence/types";
import { isDomainEvent } from "@cadence/types";
import type {
  AppendOptions,
  AppendResult,
  ChainHead,
  EventFilter,
  EventHandler,
  EventStore,
  IntegrityReport,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, seal, verifyChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `recordedAt`. Defaults to the wall clock. */
  readonly now?: () => Date;
  /**
   * Receives a subscriber's failure. A throwing handler never fails the
   * append that fed it, and later handlers still run. Defaults to stderr.
   */
  readonly onHandlerError?: HandlerErrorFn;
}

export type HandlerErrorFn = (error: unknown, stored: StoredEvent) => void;

function reportToStderr(error: unknown, stored: StoredEvent): void {
  console.error(`Event handler failed at position ${stored.position}:`, error);
}

interface Listener {
  readonly handler: EventHandler;
  readonly filter: EventFilter;
}

export class InMemoryEventStore implements EventStore {
  /** The whole log; index i holds position i + 1. */
  private readonly log: StoredEvent[] = [];
  /** Positions of each stream's events; index i holds version i + 1. */
  private readonly streams = new Map<string, number[]>();
  private readonly listeners = new Set<Listener>();
  private readonly now: () => Date;
  private readonly onHandlerError: HandlerErrorFn;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.onHandlerError = options.onHandlerError ?? reportToStderr;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options: AppendOptions = {},
  ): AppendResult {
    assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    const malformed = events.findIndex((event) => !isDomainEvent(event));
    if (malformed !== -1) {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Event ${malformed} of the batch is not a well-formed domain event`,
        streamId,
      );
    }

    const current = this.streamVersion(streamId);
    if (options.expectedVersion !== undefined && options.expectedVersion !== current) {
      throw new EventStoreError(
        "VERSION_CONFLICT",
        `Stream "${streamId}" is at version ${current}, expected ${options.expectedVersion}`,
        streamId,
      );
    }

    const positions = this.streams.get(streamId) ?? [];
    this.streams.set(streamId, positions);

    const recordedAt = this.now().toISOString();
    const firstPosition = this.log.length + 1;
    const batch: StoredEvent[] = [];
    let previousHash = this.head().hash;

    for (const [i, event] of events.entries()) {
      const stored = seal(
        { position: firstPosition + i, streamId, version: current + i + 1, recordedAt, event },
        previousHash,
      );
      previousHash = stored.hash;
      batch.push(stored);
    }

    this.log.push(...batch);
    positions.push(...batch.map((stored) => stored.position));
    this.notify(batch);

    return {
      streamId,
      firstVersion: current + 1,
      lastVersion: current + events.length,
      firstPosition,
      lastPosition: firstPosition + events.length - 1,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(filter: EventFilter = {}): readonly StoredEvent[] {
    assertFilter(filter);
    const candidates =
      filter.streamId === undefined ? this.log : this.streamEvents(filter.streamId);
    return candidates.filter((stored) => matches(stored, filter));
  }

  subscribe(handler: EventHandler, filter: EventFilter = {}): Subscription {
    assertFilter(filter);
    const listener: Listener = { handler, filter };
    this.listeners.add(listener);
    return {
      unsubscribe: () => {
        this.listeners.delete(listener);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this.streams.get(streamId)?.length ?? 0;
  }

  head(): ChainHead {
    const last = this.log[this.log.length - 1];
    return last === undefined
      ? { position: 0, hash: GENESIS_HASH }
      : { position: last.position, hash: last.hash };
  }

  verifyIntegrity(): IntegrityReport {
    return verifyChain(this.log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private streamEvents(streamId: string): StoredEvent[] {
    const positions = this.streams.get(streamId) ?? [];
    return positions.flatMap((position) => {
      const stored = this.log[position - 1];
      return stored === undefined ? [] : [stored];
    });
  }

  private notify(batch: readonly StoredEvent[]): void {
    for (const stored of batch) {
      for (const { handler, filter } of this.listeners) {
        if (!matches(stored, filter)) continue;
        try {
          handler(stored);
        } catch (error) {
          this.onHandlerError(error, stored);
        }
      }
    }
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.trim().length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function assertFilter(filter: EventFilter): void {
  if (filter.fromVersion !== undefined && filter.streamId === undefined) {
    throw new EventStoreError("INVALID_FILTER", "fromVersion needs a streamId");
  }
  if (filter.streamId !== undefined) {
    assertStreamId(filter.streamId);
  }
}

function matches(stored: StoredEvent, filter: EventFilter): boolean {
  return (
    (filter.streamId === undefined || stored.streamId === filter.streamId) &&
    (filter.fromPosition === undefined || stored.position >= filter.fromPosition) &&
    (filter.fromVersion === undefined || stored.version >= filter.fromVersion) &&
    (filter.types === undefined || filter.types.includes(stored.event.type))
  );
}
