import type { PriceSeries } from "../analyzers/backtester";
import type { SeriesSource } from "../analyzers/universe";
import { buildSignalSeries, SignalBar, SignalOptions } from "../analyzers/signals";
import type { DailyPrice } from "./marketData";

export interface MarketSignalSourceOptions extends SignalOptions {
  lookbackDays: number;
}

export type PriceLoader = (symbol: string, lookbackDays: number) => Promise<DailyPrice[]>;

/** Daily bars (Yahoo Finance in production) turned into MACD/EMA signal series. */
export class MarketSignalSource implements SeriesSource {
  constructor(
    private readonly options: MarketSignalSourceOptions,
    private readonly loadPrices: PriceLoader,
  ) {}

  async loadSignals(symbol: string): Promise<SignalBar[]> {
    const prices = await this.loadPrices(symbol, this.options.lookbackDays);
    if (prices.length === 0) {
      throw new Error(`No daily bars returned for ${symbol}`);
    }
    return buildSignalSeries(prices, this.options);
  }

  loadSeries(symbol: string): Promise<PriceSeries> {
    return this.loadSignals(symbol);
  }
}
