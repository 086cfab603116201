/**
 * @cadence/node — Keeper.
 *
 * Drives the two-phase settlement protocol on a timer:
 *   checkDue() → settle(token) when anything is due
 *
 * A failing tick is reported through the log callback and the loop keeps
 * going; the next tick re-scans live state, so nothing is lost.
 */

import type { Address } from "@cadence/types";
import type { Payroll } from "@cadence/payroll";

export interface KeeperTickResult {
  /** 1-based tick counter */
  readonly tick: number;
  readonly candidates: readonly Address[];
  readonly accrued: readonly Address[];
  readonly underfunded: readonly Address[];
  readonly skipped: number;
  /** Correlation id of the settlement call, when one was made */
  readonly correlationId?: string;
  /** Message of the error that aborted the tick */
  readonly error?: string;
}

export type KeeperLogFn = (result: KeeperTickResult) => void;

export interface KeeperOptions {
  readonly payroll: Payroll;
  readonly intervalMs: number;
  /** Identity recorded as the actor of settlement events. Default: "keeper" */
  readonly caller?: string;
  readonly logFn?: KeeperLogFn;
}

export class Keeper {
  private readonly payroll: Payroll;
  private readonly intervalMs: number;
  private readonly caller: string;
  private readonly logFn: KeeperLogFn | undefined;
  private timer: NodeJS.Timeout | undefined;
  private ticks = 0;

  constructor(options: KeeperOptions) {
    if (!Number.isSafeInteger(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`Keeper interval must be a positive integer, got ${options.intervalMs}`);
    }
    this.payroll = options.payroll;
    this.intervalMs = options.intervalMs;
    this.caller = options.caller ?? "keeper";
    this.logFn = options.logFn;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  /**
   * Run one scan and, if anything is due, one settlement.
   * Never throws.
   */
  tick(): KeeperTickResult {
    const tick = ++this.ticks;
    const result = this.runTick(tick);
    this.logFn?.(result);
    return result;
  }

  /**
   * Tick immediately, then every `intervalMs`. Returns false if already running.
   */
  start(): boolean {
    if (this.timer !== undefined) {
      return false;
    }
    this.tick();
    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);
    return true;
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private runTick(tick: number): KeeperTickResult {
    try {
      const due = this.payroll.checkDue();
      if (!due.hasDue) {
        return { tick, candidates: [], accrued: [], underfunded: [], skipped: 0 };
      }

      const report = this.payroll.settle(due.token, this.caller);
      return {
        tick,
        candidates: due.candidates,
        accrued: report.accrued,
        underfunded: report.underfunded,
        skipped: report.skipped,
        correlationId: report.correlationId,
      };
    } catch (err) {
      return {
        tick,
        candidates: [],
        accrued: [],
        underfunded: [],
        skipped: 0,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }
}
