import { scopedLogger } from "../utils/logger";
import { Backtester, GridSearchResult, InstrumentOutcome, PriceSeries } from "./backtester";

const logger = scopedLogger("universe");

// ── Collaborators ────────────────────────────────────────────────────────────

export interface SeriesSource {
  loadSeries(symbol: string): Promise<PriceSeries>;
}

export interface TradingParameters {
  stopRatio: number;
  profitRatio: number;
  winRate: number;
}

export interface ParameterSink {
  applyParameters(symbol: string, params: TradingParameters): void;
}

// ── Types ────────────────────────────────────────────────────────────────────

export interface InstrumentRecord {
  readonly symbol: string;
  outcome: InstrumentOutcome | null;
  lastError: string | null;
}

export interface RunReport {
  evaluated: string[];
  removed: string[];
  failed: { symbol: string; reason: string }[];
}

export type AddResult =
  | { added: true; outcome: InstrumentOutcome }
  | { added: false; reason: "duplicate" | "no-viable-configuration" | "error"; detail?: string };

export function toTradingParameters(outcome: InstrumentOutcome): TradingParameters {
  return {
    stopRatio: outcome.bestStopRatio,
    profitRatio: outcome.bestProfitRatio,
    winRate: outcome.winRate,
  };
}

/**
 * Tracked instruments and their tuned outcomes. Each symbol owns a single
 * record, so membership and outcome can never drift apart.
 */
export class Universe {
  private readonly records = new Map<string, InstrumentRecord>();

  constructor(
    private readonly backtester: Backtester,
    private readonly source: SeriesSource,
    private readonly sink: ParameterSink,
    symbols: readonly string[] = [],
  ) {
    for (const symbol of symbols) {
      if (!this.records.has(symbol)) {
        this.records.set(symbol, { symbol, outcome: null, lastError: null });
      }
    }
  }

  get size(): number {
    return this.records.size;
  }

  symbols(): string[] {
    return [...this.records.keys()];
  }

  has(symbol: string): boolean {
    return this.records.has(symbol);
  }

  get(symbol: string): InstrumentRecord | undefined {
    return this.records.get(symbol);
  }

  list(): InstrumentRecord[] {
    return [...this.records.values()];
  }

  private async searchSymbol(symbol: string): Promise<GridSearchResult> {
    const series = await this.source.loadSeries(symbol);
    return this.backtester.search(series);
  }

  /**
   * Re-tunes every tracked instrument. A failure stays local to its symbol;
   * symbols with no viable configuration are dropped together after the pass.
   */
  async runFull(): Promise<RunReport> {
    const report: RunReport = { evaluated: [], removed: [], failed: [] };
    const toRemove: string[] = [];

    for (const record of this.records.values()) {
      record.outcome = null;
      record.lastError = null;
    }

    for (const record of this.records.values()) {
      try {
        const result = await this.searchSymbol(record.symbol);
        report.evaluated.push(record.symbol);
        if (result.viable) {
          record.outcome = result.outcome;
          logger.info(
            `${record.symbol}: stop ${result.outcome.bestStopRatio} | profit ${result.outcome.bestProfitRatio} | ` +
              `win rate ${(result.outcome.winRate * 100).toFixed(1)}% | P&L ${result.outcome.cumulativeProfit.toFixed(2)}`,
          );
        } else {
          toRemove.push(record.symbol);
        }
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        record.lastError = msg;
        report.failed.push({ symbol: record.symbol, reason: msg });
        logger.error(`${record.symbol} backtest failed: ${msg}`);
      }
    }

    for (const symbol of toRemove) {
      this.records.delete(symbol);
      report.removed.push(symbol);
      logger.warn(`${symbol} removed — no stop/profit pair produced a single win`);
    }

    return report;
  }

  /** Pushes every tuned outcome to the sink. Returns how many were applied. */
  applyOutcomes(): number {
    let applied = 0;
    for (const record of this.records.values()) {
      if (record.outcome === null) continue;
      this.sink.applyParameters(record.symbol, toTradingParameters(record.outcome));
      applied++;
    }
    if (applied === 0) {
      logger.warn("No tuned outcomes to apply — run the backtester first");
    }
    return applied;
  }

  /**
   * Tunes a new symbol and tracks it only when a viable configuration exists,
   * so every tracked symbol added this way carries live parameters.
   */
  async addInstrument(symbol: string): Promise<AddResult> {
    if (this.records.has(symbol)) {
      logger.warn(`${symbol} is already tracked`);
      return { added: false, reason: "duplicate" };
    }

    let result: GridSearchResult;
    try {
      result = await this.searchSymbol(symbol);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`${symbol} not added — backtest failed: ${msg}`);
      return { added: false, reason: "error", detail: msg };
    }

    if (!result.viable) {
      logger.warn(`${symbol} not added — no stop/profit pair produced a single win`);
      return { added: false, reason: "no-viable-configuration" };
    }

    this.records.set(symbol, { symbol, outcome: result.outcome, lastError: null });
    this.sink.applyParameters(symbol, toTradingParameters(result.outcome));
    logger.info(`${symbol} added (stop ${result.outcome.bestStopRatio}, profit ${result.outcome.bestProfitRatio})`);
    return { added: true, outcome: result.outcome };
  }

  removeInstrument(symbol: string): boolean {
    const removed = this.records.delete(symbol);
    if (removed) logger.info(`${symbol} removed from the universe`);
    else logger.warn(`${symbol} is not tracked`);
    return removed;
  }
}
