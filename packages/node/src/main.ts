/**
 * @cadence/node — Entry point.
 *
 * Loads config, bootstraps the payroll, starts the keeper,
 * and handles graceful shutdown.
 */

import pino from "pino";
import { formatUnits } from "@cadence/ledger";
import { loadConfig } from "./config.js";
import { bootstrap } from "./bootstrap.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { payroll, keeper } = bootstrap(config, logger);

  keeper.start();
  logger.info({ intervalMs: config.KEEPER_INTERVAL_MS }, "Keeper started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    keeper.stop();
    logger.info(
      {
        balance: formatUnits(payroll.getContractBalance(), config.UNIT_DECIMALS),
        unallocated: formatUnits(payroll.getUnallocatedBalance(), config.UNIT_DECIMALS),
      },
      "Shutdown complete",
    );
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
