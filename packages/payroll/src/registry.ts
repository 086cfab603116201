/**
 * @cadence/payroll — Recipient registry.
 *
 * The ordered list of recipients with an active schedule.
 *
 * Rules:
 * - No duplicates
 * - Removal keeps the relative order of everyone else (no swap-remove),
 *   so scans always walk recipients in registration order
 */

import type { Address } from "@cadence/types";
import { DuplicateRecipientError } from "./errors.js";

export class RecipientRegistry {
  private readonly _recipients: Address[] = [];

  constructor(recipients: readonly Address[] = []) {
    for (const recipient of recipients) {
      this.append(recipient);
    }
  }

  append(recipient: Address): void {
    if (this.includes(recipient)) {
      throw new DuplicateRecipientError(recipient);
    }
    this._recipients.push(recipient);
  }

  /**
   * Remove `recipient`, shifting later entries left by one.
   * Returns false (and changes nothing) if it is not registered.
   */
  remove(recipient: Address): boolean {
    const index = this._recipients.indexOf(recipient);
    if (index === -1) {
      return false;
    }
    this._recipients.splice(index, 1);
    return true;
  }

  includes(recipient: Address): boolean {
    return this._recipients.includes(recipient);
  }

  list(): readonly Address[] {
    return [...this._recipients];
  }

  get size(): number {
    return this._recipients.length;
  }
}
