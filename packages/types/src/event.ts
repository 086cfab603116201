/**
 * Event Types
 *
 * Every observable payroll state change is recorded as a DomainEvent,
 * appended to a store and never edited afterwards. Payloads are plain
 * JSON: amounts travel as decimal strings.
 */

/** Subsystems allowed to emit events. */
export type EventSource = "payroll";

export interface EventMetadata {
  /** `${correlationId}:${index within the call}` */
  readonly eventId: string;
  /** ISO 8601, payroll time */
  readonly timestamp: string;
  /** Address (or process name) that made the call */
  readonly actor: string;
  /** Shared by every event one call emitted */
  readonly correlationId: string;
  readonly source: EventSource;
}

export interface DomainEvent {
  /** `<subsystem>.<entity>.<action>`, e.g. "payroll.payment.accrued" */
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
