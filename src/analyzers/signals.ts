import type { DailyPrice } from "../fetchers/marketData";
import type { PriceStep } from "./backtester";
import { ema, macd } from "./indicators";

export interface SignalOptions {
  emaSpan: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
}

export const DEFAULT_SIGNAL_OPTIONS: SignalOptions = {
  emaSpan: 100,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
};

export interface SignalBar extends PriceStep {
  macd: number | null;
  signalLine: number | null;
  histogram: number | null;
  /** Bar on which the bearish (short) state turned on. Reported, never traded. */
  exitSignal: boolean;
}

/**
 * Long state: MACD below zero but above its signal line while price sits
 * above the baseline EMA. Short state is the mirror. A signal fires on the
 * bar where the state turns on.
 */
export function buildSignalSeries(
  prices: readonly DailyPrice[],
  options: SignalOptions = DEFAULT_SIGNAL_OPTIONS,
): SignalBar[] {
  const closes = prices.map((p) => p.close);
  const baseline = ema(closes, options.emaSpan);
  const macdPoints = macd(closes, options.macdFast, options.macdSlow, options.macdSignal);

  let prevLong = false;
  let prevShort = false;

  return prices.map((p, i) => {
    const { macd: m, signal: s, histogram } = macdPoints[i];
    // span-only EMA is defined from the first close onward
    const base = baseline[i] ?? p.close;

    const longState = m !== null && s !== null && m < 0 && m > s && p.close > base;
    const shortState = m !== null && s !== null && m > 0 && m < s && p.close < base;

    const bar: SignalBar = {
      date: p.date,
      close: p.close,
      baseline: base,
      entrySignal: i > 0 && longState && !prevLong,
      exitSignal: i > 0 && shortState && !prevShort,
      macd: m,
      signalLine: s,
      histogram,
    };

    prevLong = longState;
    prevShort = shortState;
    return bar;
  });
}
