import { scopedLogger } from "../utils/logger";
import { Backtester } from "../analyzers/backtester";
import { AddResult, ParameterSink, RunReport, SeriesSource, TradingParameters, Universe } from "../analyzers/universe";
import type { Brokerage } from "../brokers/alpaca";
import { ExecutionResult, MacdTrader, OrderListener, SignalLoader } from "./macdTrader";

const logger = scopedLogger("desk");

export interface TradingDeskDeps {
  backtester: Backtester;
  source: SeriesSource & SignalLoader;
  broker: Brokerage;
  listener?: OrderListener;
  positionFraction?: number;
}

export interface DailyRun {
  report: RunReport;
  applied: number;
  executions: { symbol: string; result: ExecutionResult | null; error: string | null }[];
}

/**
 * Keeps one trader per tracked symbol and feeds them tuned parameters.
 * The universe decides membership; traders follow it.
 */
export class TradingDesk implements ParameterSink {
  readonly universe: Universe;
  private readonly traders = new Map<string, MacdTrader>();

  constructor(private readonly deps: TradingDeskDeps, symbols: readonly string[]) {
    this.universe = new Universe(deps.backtester, deps.source, this, symbols);
    for (const symbol of this.universe.symbols()) {
      this.traders.set(symbol, this.createTrader(symbol));
    }
  }

  private createTrader(symbol: string): MacdTrader {
    return new MacdTrader(symbol, {
      broker: this.deps.broker,
      signals: this.deps.source,
      listener: this.deps.listener,
      positionFraction: this.deps.positionFraction,
    });
  }

  applyParameters(symbol: string, params: TradingParameters): void {
    const trader = this.traders.get(symbol);
    if (!trader) {
      logger.warn(`No trader for ${symbol} — parameters dropped`);
      return;
    }
    trader.setParameters(params);
  }

  symbols(): string[] {
    return [...this.traders.keys()];
  }

  trader(symbol: string): MacdTrader | undefined {
    return this.traders.get(symbol);
  }

  private pruneTraders(): void {
    for (const symbol of [...this.traders.keys()]) {
      if (!this.universe.has(symbol)) this.traders.delete(symbol);
    }
  }

  /** Tunes the whole universe and hands the results to the traders. */
  async retune(): Promise<{ report: RunReport; applied: number }> {
    const report = await this.universe.runFull();
    this.pruneTraders();
    const applied = this.universe.applyOutcomes();
    return { report, applied };
  }

  async addSymbol(symbol: string): Promise<AddResult> {
    if (this.universe.has(symbol)) {
      return this.universe.addInstrument(symbol);
    }
    this.traders.set(symbol, this.createTrader(symbol));
    const result = await this.universe.addInstrument(symbol);
    if (!result.added) this.traders.delete(symbol);
    return result;
  }

  removeSymbol(symbol: string): boolean {
    const removed = this.universe.removeInstrument(symbol);
    this.traders.delete(symbol);
    return removed;
  }

  /**
   * Re-tunes, then runs every trader whose symbol was tuned in this pass.
   * One trader failing does not stop the rest.
   */
  async runDaily(): Promise<DailyRun> {
    const { report, applied } = await this.retune();
    const executions: DailyRun["executions"] = [];

    for (const trader of this.traders.values()) {
      const record = this.universe.get(trader.symbol);
      if (record === undefined || record.outcome === null) {
        const reason = `not tuned: ${record?.lastError ?? "no outcome"}`;
        logger.warn(`${trader.symbol} skipped: ${reason}`);
        executions.push({ symbol: trader.symbol, result: { action: "skipped", reason }, error: null });
        continue;
      }
      try {
        const result = await trader.execute();
        executions.push({ symbol: trader.symbol, result, error: null });
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        logger.error(`${trader.symbol} execution failed: ${msg}`);
        executions.push({ symbol: trader.symbol, result: null, error: msg });
      }
    }

    return { report, applied, executions };
  }
}
