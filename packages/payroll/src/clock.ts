/**
 * @cadence/payroll — Time sources.
 *
 * Payroll time is integer seconds since the Unix epoch, the same
 * resolution as a block timestamp.
 */

export interface Clock {
  /** Current time in whole seconds. */
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to. Used by tests and simulations.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    this._now = assertSeconds(start);
  }

  now(): number {
    return this._now;
  }

  advance(seconds: number): number {
    this._now += assertSeconds(seconds);
    return this._now;
  }

  set(timestamp: number): void {
    this._now = assertSeconds(timestamp);
  }
}

function assertSeconds(value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Expected a non-negative whole number of seconds, got ${value}`);
  }
  return value;
}
