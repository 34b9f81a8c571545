import { scopedLogger } from "../utils/logger";
import { planBracketOrder, BracketPlan, DEFAULT_POSITION_FRACTION } from "../utils/finance";
import type { Brokerage, PlacedOrder } from "../brokers/alpaca";
import type { SignalBar } from "../analyzers/signals";
import type { TradingParameters } from "../analyzers/universe";

const logger = scopedLogger("trader");

// ── Collaborators ────────────────────────────────────────────────────────────

export interface SignalLoader {
  loadSignals(symbol: string): Promise<SignalBar[]>;
}

export interface OrderListener {
  orderAlert(symbol: string, plan: BracketPlan, order: PlacedOrder): Promise<void>;
}

export interface MacdTraderDeps {
  broker: Brokerage;
  signals: SignalLoader;
  listener?: OrderListener;
  positionFraction?: number;
}

// ── Types ────────────────────────────────────────────────────────────────────

/** Used until a backtest tunes the symbol. */
export const DEFAULT_PARAMETERS: Readonly<TradingParameters> = Object.freeze({
  stopRatio: 0.95,
  profitRatio: 1.5,
  winRate: 1,
});

export type ExecutionResult =
  | { action: "ordered"; plan: BracketPlan; order: PlacedOrder }
  | { action: "skipped"; reason: string }
  | { action: "short-signal" }
  | { action: "no-signal" };

/**
 * Trades one symbol: when the latest daily bar carries a fresh MACD entry
 * signal, buys with a bracket order sized by the tuned win rate.
 */
export class MacdTrader {
  private params: TradingParameters = { ...DEFAULT_PARAMETERS };

  constructor(readonly symbol: string, private readonly deps: MacdTraderDeps) {}

  get parameters(): TradingParameters {
    return { ...this.params };
  }

  setParameters(params: TradingParameters): void {
    this.params = { ...params };
  }

  async execute(): Promise<ExecutionResult> {
    const bars = await this.deps.signals.loadSignals(this.symbol);
    const last = bars[bars.length - 1];
    if (last === undefined) {
      return this.skip("no daily bars");
    }

    if (last.exitSignal) {
      logger.info(`A short signal was detected for ${this.symbol} — shorts are not traded`);
      return { action: "short-signal" };
    }
    if (!last.entrySignal) {
      logger.info(`No signal was detected for ${this.symbol}`);
      return { action: "no-signal" };
    }

    const held = await this.deps.broker.getPosition(this.symbol);
    if (held !== null && held.qty > 0) return this.skip(`already holding ${held.qty} shares`);

    const account = await this.deps.broker.getAccount();
    if (account === null) return this.skip("account unavailable");

    const latestPrice = await this.deps.broker.getLatestPrice(this.symbol);
    if (latestPrice === null) return this.skip("latest price unavailable");

    const decision = planBracketOrder({
      cash: account.cash,
      winRate: this.params.winRate,
      latestPrice,
      baseline: last.baseline,
      stopRatio: this.params.stopRatio,
      profitRatio: this.params.profitRatio,
      positionFraction: this.deps.positionFraction ?? DEFAULT_POSITION_FRACTION,
    });
    if (!decision.ok) return this.skip(decision.reason);

    const { plan } = decision;
    const order = await this.deps.broker.submitBracketOrder({
      symbol: this.symbol,
      qty: plan.qty,
      takeProfit: plan.takeProfit,
      stopLoss: plan.stopLoss,
    });
    if (order === null) return this.skip("order rejected by brokerage");

    if (this.deps.listener) {
      await this.deps.listener.orderAlert(this.symbol, plan, order);
    }
    return { action: "ordered", plan, order };
  }

  private skip(reason: string): ExecutionResult {
    logger.warn(`${this.symbol} entry signal skipped: ${reason}`);
    return { action: "skipped", reason };
  }
}
