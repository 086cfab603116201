/**
 * @cadence/node — Process wiring.
 *
 * Builds the payroll, seeds it from config and attaches a keeper whose
 * tick results go to the logger. Transfers settle in process through
 * InMemoryTransport.
 */

import type { Logger } from "pino";
import { InMemoryEventStore } from "@cadence/event-store";
import { InMemoryTransport, Payroll, SystemClock } from "@cadence/payroll";
import type { Clock } from "@cadence/payroll";
import { formatUnits, parseUnits } from "@cadence/ledger";
import { parseRecipients } from "./config.js";
import type { AppConfig } from "./config.js";
import { Keeper } from "./keeper.js";
import type { KeeperTickResult } from "./keeper.js";

export interface NodeInstance {
  readonly payroll: Payroll;
  readonly keeper: Keeper;
  readonly eventStore: InMemoryEventStore;
  readonly transport: InMemoryTransport;
}

export function bootstrap(
  config: AppConfig,
  logger: Logger,
  clock: Clock = new SystemClock(),
): NodeInstance {
  const eventStore = new InMemoryEventStore({
    now: () => new Date(clock.now() * 1000),
    onHandlerError: (err, stored) => {
      logger.error(
        { err, position: stored.position, type: stored.event.type },
        "Event handler failed",
      );
    },
  });
  const transport = new InMemoryTransport();
  const payroll = new Payroll({
    address: config.PAYROLL_ADDRESS,
    owner: config.PAYROLL_OWNER,
    transport,
    clock,
    eventStore,
  });

  eventStore.subscribe((stored) => {
    logger.debug(
      { stream: stored.streamId, version: stored.version, payload: stored.event.payload },
      stored.event.type,
    );
  });

  const deposit = parseUnits(config.INITIAL_DEPOSIT, config.UNIT_DECIMALS);
  if (deposit > 0n) {
    payroll.deposit(deposit);
  }

  for (const { recipient, amount, interval } of parseRecipients(
    config.RECIPIENTS,
    config.UNIT_DECIMALS,
  )) {
    payroll.addRecipient(config.PAYROLL_OWNER, recipient, amount, interval);
  }

  logger.info(
    {
      address: payroll.getAddress(),
      owner: payroll.getOwner(),
      recipients: payroll.getRecipients().length,
      balance: formatUnits(payroll.getContractBalance(), config.UNIT_DECIMALS),
    },
    "Payroll ready",
  );

  const keeper = new Keeper({
    payroll,
    intervalMs: config.KEEPER_INTERVAL_MS,
    logFn: (result) => {
      logTick(logger, result);
    },
  });

  return { payroll, keeper, eventStore, transport };
}

function logTick(logger: Logger, result: KeeperTickResult): void {
  if (result.error !== undefined) {
    logger.error({ tick: result.tick, err: result.error }, "Keeper tick failed");
    return;
  }
  if (result.underfunded.length > 0) {
    logger.warn(
      { tick: result.tick, accrued: result.accrued, underfunded: result.underfunded },
      "Payroll underfunded",
    );
    return;
  }
  if (result.accrued.length > 0) {
    logger.info({ tick: result.tick, accrued: result.accrued }, "Payments accrued");
    return;
  }
  logger.debug({ tick: result.tick }, "Nothing due");
}
