/**
 * @cadence/ledger — Balance accounting for Cadence payroll.
 *
 * - EscrowLedger: per-recipient accrued-but-unwithdrawn balances
 * - ContractVault: total funds held by the payroll
 * - Unit arithmetic: bigint smallest-unit amounts, decimal strings at the edges
 *
 * Zero runtime dependencies beyond @cadence/types.
 */

export { EscrowLedger } from "./escrow.js";
export { ContractVault } from "./vault.js";

export {
  NATIVE_DECIMALS,
  parseUnits,
  formatUnits,
  assertPositive,
  assertNonNegative,
  parseRaw,
} from "./units.js";

export type {
  LedgerErrorCode,
  EscrowEntry,
  LedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
