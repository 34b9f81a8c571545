/**
 * Daily MACD trader
 * ─────────────────────────────────────────────────────────────────────────────
 * Tunes stop/profit ratios for the tracked symbols, then every day at
 * TRADE_TIME (local) re-tunes and submits an Alpaca bracket order for each
 * symbol whose latest daily bar fired a MACD entry signal.
 *
 * Run: npm run trade -- [--add NVDA] [--once]
 */

import dotenv from "dotenv";
dotenv.config();

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "./config";
import { Backtester } from "./analyzers/backtester";
import { AlpacaClient } from "./brokers/alpaca";
import { MarketSignalSource } from "./fetchers/signalSource";
import { fetchDailyPrices } from "./fetchers/marketData";
import { DailyRun, TradingDesk } from "./traders/tradingDesk";
import { TelegramNotifier } from "./utils/telegram";
import { scheduleDaily } from "./utils/schedule";
import logger from "./utils/logger";

function logRun(run: DailyRun): void {
  const ordered = run.executions.filter((e) => e.result?.action === "ordered").map((e) => e.symbol);
  const failed = run.executions.filter((e) => e.error !== null).map((e) => e.symbol);
  logger.info(
    `Daily run: ${run.report.evaluated.length} tuned, ${run.applied} applied, ` +
      `${run.report.removed.length} removed, ${ordered.length} order(s)` +
      `${ordered.length > 0 ? ` [${ordered.join(", ")}]` : ""}` +
      `${failed.length > 0 ? ` | failed: ${failed.join(", ")}` : ""}`,
  );
}

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .usage("Usage: $0 [--add SYMBOL ...] [--once]")
    .option("add", {
      type: "string",
      array: true,
      describe: "Extra symbols to tune and track on start-up",
    })
    .option("once", {
      type: "boolean",
      default: false,
      describe: "Run a single trading pass now and exit",
    })
    .strict()
    .help().argv;

  const config = loadConfig();
  const broker = new AlpacaClient(config.alpaca);
  const notifier = new TelegramNotifier(config.telegram);

  const account = await broker.getAccount();
  if (account === null) {
    throw new Error("Could not reach the Alpaca account — check ALPACA_* settings");
  }
  logger.info(`Alpaca account ${account.status} | cash $${account.cash.toFixed(2)} | portfolio $${account.portfolioValue.toFixed(2)}`);

  const desk = new TradingDesk(
    {
      backtester: new Backtester(config.grid, { maxSteps: config.maxSimulationSteps }),
      source: new MarketSignalSource(config.signals, fetchDailyPrices),
      broker,
      listener: notifier,
      positionFraction: config.positionFraction,
    },
    config.symbols,
  );

  const { report } = await desk.retune();
  await notifier.backtestSummary(desk.universe.list(), report);

  for (const symbol of argv.add ?? []) {
    const result = await desk.addSymbol(symbol.toUpperCase());
    if (!result.added) logger.warn(`${symbol.toUpperCase()} not added (${result.reason})`);
  }

  if (argv.once) {
    logRun(await desk.runDaily());
    return;
  }

  logger.info(`Trading ${desk.symbols().join(", ")} daily at ${config.tradeTime}`);
  const job = scheduleDaily(config.tradeTime, async () => {
    logRun(await desk.runDaily());
  });

  const shutdown = () => {
    logger.info("Stopping scheduler");
    job.stop();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
