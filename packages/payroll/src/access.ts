/**
 * @cadence/payroll — Access gate.
 *
 * A single owner holds the privileged capability and may hand it on.
 */

import type { Address } from "@cadence/types";
import { normalizeAddress } from "@cadence/types";
import { InvalidRecipientError, UnauthorizedError } from "./errors.js";

export class OwnerGate {
  private _owner: Address;

  constructor(owner: string) {
    this._owner = requireAddress(owner);
  }

  owner(): Address {
    return this._owner;
  }

  /**
   * @throws UnauthorizedError if `caller` is not the owner
   */
  assertPrivileged(caller: string, action: string): void {
    if (normalizeAddress(caller) !== this._owner) {
      throw new UnauthorizedError(caller, action);
    }
  }

  /**
   * Hand the capability to `next`. Returns the previous owner.
   */
  transferOwnership(caller: string, next: string): Address {
    this.assertPrivileged(caller, "transfer ownership");
    const previous = this._owner;
    this._owner = requireAddress(next);
    return previous;
  }
}

export function requireAddress(value: string): Address {
  const address = normalizeAddress(value);
  if (address === undefined) {
    throw new InvalidRecipientError(value);
  }
  return address;
}
