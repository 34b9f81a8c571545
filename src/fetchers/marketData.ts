import YahooFinance from "yahoo-finance2";
import { scopedLogger } from "../utils/logger";

const logger = scopedLogger("yahoo");

// ── Shared Yahoo Finance instance ───────────────────────────────────────────

const yf = new YahooFinance({ suppressNotices: ["ripHistorical", "yahooSurvey"] });

// ── Exported Types ───────────────────────────────────────────────────────────

export interface DailyPrice {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// ── Yahoo Finance Data Fetchers ─────────────────────────────────────────────

async function fetchDailyPricesFromYahoo(symbol: string, lookbackDays: number): Promise<DailyPrice[]> {
  // daily bars: stop at yesterday so the last bar is a closed session
  const end = new Date();
  end.setDate(end.getDate() - 1);
  const start = new Date(end);
  start.setDate(end.getDate() - lookbackDays);

  const results = await yf.historical(symbol, {
    period1: start,
    period2: end,
  });

  return results
    .map((row: { date: Date; open: number; high: number; low: number; close: number; volume: number }) => ({
      date: row.date.toISOString().split("T")[0],
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
    }))
    .filter((p: DailyPrice) => p.close > 0)
    .sort((a: DailyPrice, b: DailyPrice) => a.date.localeCompare(b.date));
}

// ── Public Fetchers ─────────────────────────────────────────────────────────

export async function fetchDailyPrices(symbol: string, lookbackDays = 1825): Promise<DailyPrice[]> {
  const prices = await fetchDailyPricesFromYahoo(symbol, lookbackDays);
  logger.info(`${symbol} prices: Yahoo Finance — ${prices.length} days`);
  return prices;
}
