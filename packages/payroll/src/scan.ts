/**
 * @cadence/payroll — Scan/select phase.
 *
 * Read-only: walks the registry and returns who is due right now.
 * The result is a snapshot and may be stale by the time it is settled.
 */

import type { Address } from "@cadence/types";
import { isDue } from "./schedule.js";
import type { PayrollState } from "./types.js";

export function scanDue(
  state: Pick<PayrollState, "registry" | "schedules">,
  now: number,
): readonly Address[] {
  return state.registry
    .list()
    .filter((recipient) => isDue(state.schedules.get(recipient), now));
}
