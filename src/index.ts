#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "./config";
import { Backtester, GridSearchResult, TrialResult } from "./analyzers/backtester";
import { MarketSignalSource } from "./fetchers/signalSource";
import { fetchDailyPrices } from "./fetchers/marketData";
import logger from "./utils/logger";

// ── CLI ──────────────────────────────────────────────────────────────────────

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("Usage: $0 --ticker <SYMBOL>")
    .option("ticker", {
      alias: "t",
      type: "string",
      demandOption: true,
      describe: "Stock ticker symbol (e.g. AAPL, MSFT)",
    })
    .option("lookback", {
      type: "number",
      describe: "Days of daily bars to backtest over (defaults to LOOKBACK_DAYS)",
    })
    .strict()
    .help().argv;

  const symbol = argv.ticker.toUpperCase();
  const config = loadConfig();
  const lookbackDays = argv.lookback ?? config.signals.lookbackDays;

  logger.info(`Ratio grid for ${symbol} — ${lookbackDays} days of daily bars`);

  const source = new MarketSignalSource({ ...config.signals, lookbackDays }, fetchDailyPrices);
  const bars = await source.loadSignals(symbol);
  const entries = bars.filter((b) => b.entrySignal).length;
  const shorts = bars.filter((b) => b.exitSignal).length;
  logger.info(`${bars.length} bars | ${entries} entry signal(s) | ${shorts} short signal(s)`);

  const backtester = new Backtester(config.grid, { maxSteps: config.maxSimulationSteps });
  const result = backtester.search(bars);

  printGrid(symbol, result);
}

// ── Console output ───────────────────────────────────────────────────────────

function isSelected(result: GridSearchResult, trial: TrialResult): boolean {
  return result.viable &&
    result.outcome.bestStopRatio === trial.stopRatio &&
    result.outcome.bestProfitRatio === trial.profitRatio;
}

function printGrid(symbol: string, result: GridSearchResult): void {
  logger.info(`${"═".repeat(65)}`);
  logger.info(`  ${"Stop".padEnd(7)}${"Profit".padEnd(8)}${"Wins".padEnd(6)}${"Losses".padEnd(8)}${"Open".padEnd(6)}${"Win rate".padEnd(10)}P&L`);
  logger.info(`${"─".repeat(65)}`);
  for (const t of result.trials) {
    const mark = isSelected(result, t) ? "  ◀ selected" : "";
    logger.info(
      `  ${String(t.stopRatio).padEnd(7)}${String(t.profitRatio).padEnd(8)}${String(t.winCount).padEnd(6)}` +
        `${String(t.lossCount).padEnd(8)}${String(t.openCount).padEnd(6)}` +
        `${`${(t.winRate * 100).toFixed(1)}%`.padEnd(10)}${t.cumulativeProfit.toFixed(2)}${mark}`,
    );
  }
  logger.info(`${"─".repeat(65)}`);
  if (result.viable) {
    const o = result.outcome;
    logger.info(
      `  ${symbol}: stop ${o.bestStopRatio} × EMA | profit ${o.bestProfitRatio} × stop | ` +
        `win rate ${(o.winRate * 100).toFixed(1)}% | P&L ${o.cumulativeProfit.toFixed(2)}`,
    );
  } else {
    logger.warn(`  ${symbol}: no stop/profit pair produced a win — it would be removed from the universe`);
  }
  logger.info(`${"═".repeat(65)}`);
}

// ── Run ──────────────────────────────────────────────────────────────────────

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
