/**
 * @cadence/node — Keeper process for Cadence payroll.
 */

export { loadConfig, parseRecipients, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedRecipient } from "./config.js";
export { Keeper } from "./keeper.js";
export type { KeeperOptions, KeeperTickResult, KeeperLogFn } from "./keeper.js";
export { bootstrap } from "./bootstrap.js";
export type { NodeInstance } from "./bootstrap.js";
