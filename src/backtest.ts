/**
 * Ratio-grid backtester
 * ─────────────────────────────────────────────────────────────────────────────
 * Fetches five years of daily bars from Yahoo Finance for the tracked symbols,
 * derives MACD/EMA entry signals, searches every stop × profit ratio pair per
 * symbol, drops symbols where no pair ever wins, and writes
 * logs/backtest_results.json with the chosen ratios, win rate and P&L.
 *
 * Run: npm run backtest -- [--symbols AAPL,MSFT]
 */

import dotenv from "dotenv";
dotenv.config();

import fs from "fs";
import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { loadConfig } from "./config";
import { Backtester } from "./analyzers/backtester";
import { InstrumentRecord, RunReport, Universe } from "./analyzers/universe";
import { MarketSignalSource } from "./fetchers/signalSource";
import { fetchDailyPrices } from "./fetchers/marketData";
import { TelegramNotifier } from "./utils/telegram";
import logger from "./utils/logger";

const LOGS_DIR = path.resolve(process.cwd(), "logs");
const OUTPUT_PATH = path.resolve(LOGS_DIR, "backtest_results.json");

interface BacktestResults {
  generated_at: string;
  stop_ratios: number[];
  profit_ratios: number[];
  tuned: {
    symbol: string;
    stop_ratio: number;
    profit_ratio: number;
    win_rate: number;
    money_made: number;
    signals: number;
  }[];
  removed: string[];
  failed: { symbol: string; reason: string }[];
}

function buildResults(
  stopRatios: number[],
  profitRatios: number[],
  records: InstrumentRecord[],
  report: RunReport,
): BacktestResults {
  const tuned: BacktestResults["tuned"] = [];
  for (const r of records) {
    if (r.outcome === null) continue;
    tuned.push({
      symbol: r.symbol,
      stop_ratio: r.outcome.bestStopRatio,
      profit_ratio: r.outcome.bestProfitRatio,
      win_rate: parseFloat(r.outcome.winRate.toFixed(4)),
      money_made: parseFloat(r.outcome.cumulativeProfit.toFixed(2)),
      signals: r.outcome.signalCount,
    });
  }
  return {
    generated_at: new Date().toISOString(),
    stop_ratios: stopRatios,
    profit_ratios: profitRatios,
    tuned,
    removed: report.removed,
    failed: report.failed,
  };
}

function printSummary(results: BacktestResults): void {
  const sep = "═".repeat(62);
  logger.info(sep);
  logger.info("  BACKTEST COMPLETE");
  logger.info("─".repeat(62));
  logger.info(`  ${"Symbol".padEnd(8)}${"Stop".padEnd(8)}${"Profit".padEnd(8)}${"Win rate".padEnd(10)}${"Signals".padEnd(9)}P&L`);
  for (const t of results.tuned) {
    logger.info(
      `  ${t.symbol.padEnd(8)}${String(t.stop_ratio).padEnd(8)}${String(t.profit_ratio).padEnd(8)}` +
        `${`${(t.win_rate * 100).toFixed(1)}%`.padEnd(10)}${String(t.signals).padEnd(9)}${t.money_made.toFixed(2)}`,
    );
  }
  logger.info("─".repeat(62));
  if (results.removed.length > 0) logger.info(`  Removed (no winning pair): ${results.removed.join(", ")}`);
  for (const f of results.failed) logger.warn(`  Failed: ${f.symbol} — ${f.reason}`);
  logger.info(sep);
  logger.info(`  Saved → ${OUTPUT_PATH}`);
}

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .usage("Usage: $0 [--symbols AAPL,MSFT]")
    .option("symbols", {
      alias: "s",
      type: "string",
      describe: "Comma-separated symbols (defaults to SYMBOLS from .env)",
    })
    .option("notify", {
      type: "boolean",
      default: false,
      describe: "Send the summary to Telegram",
    })
    .strict()
    .help().argv;

  const config = loadConfig(argv.symbols ? { ...process.env, SYMBOLS: argv.symbols } : process.env);

  logger.info("Ratio-grid backtester");
  logger.info(`Symbols : ${config.symbols.join(", ")}`);
  logger.info(`Stops   : ${config.grid.stopRatios.join(", ")} (× EMA${config.signals.emaSpan})`);
  logger.info(`Profits : ${config.grid.profitRatios.join(", ")} (× stop)`);

  const backtester = new Backtester(config.grid, { maxSteps: config.maxSimulationSteps });
  const source = new MarketSignalSource(config.signals, fetchDailyPrices);
  // nothing trades here; the sink only echoes what a live run would receive
  const universe = new Universe(
    backtester,
    source,
    {
      applyParameters: (symbol, params) =>
        logger.debug(`${symbol} ← stop ${params.stopRatio}, profit ${params.profitRatio}, win rate ${params.winRate}`),
    },
    config.symbols,
  );

  const report = await universe.runFull();
  universe.applyOutcomes();

  const results = buildResults(config.grid.stopRatios, config.grid.profitRatios, universe.list(), report);
  fs.mkdirSync(LOGS_DIR, { recursive: true });
  fs.writeFileSync(OUTPUT_PATH, JSON.stringify(results, null, 2));
  printSummary(results);

  if (argv.notify) {
    await new TelegramNotifier(config.telegram).backtestSummary(universe.list(), report);
  }
}

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
