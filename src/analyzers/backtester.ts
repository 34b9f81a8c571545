import { z } from "zod";

// ── Types ────────────────────────────────────────────────────────────────────

/** One daily bar as the engine sees it. `baseline` is the trend reference (EMA). */
export interface PriceStep {
  date: string;
  close: number;
  baseline: number;
  entrySignal: boolean;
}

export type PriceSeries = readonly PriceStep[];

export interface RatioGrid {
  /** Multipliers on the baseline at the signal bar, giving the stop level. */
  readonly stopRatios: readonly number[];
  /** Multipliers on the stop level, giving the target level. */
  readonly profitRatios: readonly number[];
}

export type TradeOutcome =
  | { kind: "win"; profit: number; exitIndex: number; barsWalked: number }
  | { kind: "loss"; profit: number; exitIndex: number; barsWalked: number }
  | { kind: "open"; profit: 0; exitIndex: null; barsWalked: number };

export interface TrialResult {
  stopRatio: number;
  profitRatio: number;
  signalCount: number;
  winCount: number;
  lossCount: number;
  openCount: number;
  /** winCount / signalCount; unresolved trades stay in the denominator. */
  winRate: number;
  cumulativeProfit: number;
}

export interface InstrumentOutcome {
  bestStopRatio: number;
  bestProfitRatio: number;
  winRate: number;
  cumulativeProfit: number;
  signalCount: number;
}

export type GridSearchResult =
  | { viable: true; outcome: InstrumentOutcome; trials: TrialResult[] }
  | { viable: false; trials: TrialResult[] };

export interface BacktesterOptions {
  /** Upper bound on bars walked across one grid search. */
  maxSteps?: number;
}

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const PriceStepSchema = z.object({
  date: z.string().min(1),
  close: z.number().finite().positive(),
  baseline: z.number().finite().positive(),
  entrySignal: z.boolean(),
});

const PriceSeriesSchema = z
  .array(PriceStepSchema)
  .min(1, "price series is empty")
  .superRefine((steps, ctx) => {
    for (let i = 1; i < steps.length; i++) {
      if (steps[i].date.localeCompare(steps[i - 1].date) <= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, "date"],
          message: `bar ${i} (${steps[i].date}) is not after bar ${i - 1} (${steps[i - 1].date})`,
        });
        return;
      }
    }
  });

const RatioListSchema = z.array(z.number().finite().positive()).min(1);

/**
 * Rejects a series the simulator cannot walk: empty, non-positive or
 * non-finite prices, or dates out of chronological order.
 */
export function validatePriceSeries(series: PriceSeries): void {
  const result = PriceSeriesSchema.safeParse(series);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new Error(`Malformed price series at ${first.path.join(".") || "root"}: ${first.message}`);
  }
}

export function entrySignalIndices(series: PriceSeries): number[] {
  const indices: number[] = [];
  series.forEach((step, i) => {
    if (step.entrySignal) indices.push(i);
  });
  return indices;
}

// ── Level helpers ────────────────────────────────────────────────────────────

export function stopLevelFor(stopRatio: number, baseline: number): number {
  return stopRatio * baseline;
}

export function targetLevelFor(profitRatio: number, stopLevel: number): number {
  return profitRatio * stopLevel;
}

// ── Trade Simulator ──────────────────────────────────────────────────────────

/**
 * Walks one entry signal forward, starting at the signal bar, until the close
 * reaches the target (win, credited the full target level) or falls to the
 * stop (loss, debited entry close minus stop). Both bounds are inclusive.
 * A trade still open at the last bar is reported as `open`.
 */
export function simulateTrade(
  series: PriceSeries,
  signalIndex: number,
  stopRatio: number,
  profitRatio: number,
): TradeOutcome {
  const entry = series[signalIndex];
  const stopLevel = stopLevelFor(stopRatio, entry.baseline);
  const riskAmount = entry.close - stopLevel;
  const targetLevel = targetLevelFor(profitRatio, stopLevel);

  for (let t = signalIndex; t < series.length; t++) {
    const close = series[t].close;
    if (close >= targetLevel) {
      return { kind: "win", profit: targetLevel, exitIndex: t, barsWalked: t - signalIndex + 1 };
    }
    if (close <= stopLevel) {
      return { kind: "loss", profit: -riskAmount, exitIndex: t, barsWalked: t - signalIndex + 1 };
    }
  }

  return { kind: "open", profit: 0, exitIndex: null, barsWalked: series.length - signalIndex };
}

// ── Grid Search Driver ───────────────────────────────────────────────────────

interface SearchState {
  greatestAccuracy: number;
  greatestMoney: number;
  best: TrialResult | null;
  trials: TrialResult[];
  stepsUsed: number;
}

export class Backtester {
  readonly grid: RatioGrid;
  private readonly maxSteps: number;

  constructor(grid: RatioGrid, options: BacktesterOptions = {}) {
    const stops = RatioListSchema.safeParse(grid.stopRatios);
    const profits = RatioListSchema.safeParse(grid.profitRatios);
    if (!stops.success) throw new Error("Ratio grid needs at least one finite, positive stop ratio");
    if (!profits.success) throw new Error("Ratio grid needs at least one finite, positive profit ratio");

    this.grid = Object.freeze({
      stopRatios: Object.freeze([...grid.stopRatios]),
      profitRatios: Object.freeze([...grid.profitRatios]),
    });
    this.maxSteps = options.maxSteps ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Runs every entry signal through one (stop, profit) pair.
   * `stepsUsed` is the running bar count for the whole grid search.
   */
  evaluateTrial(
    series: PriceSeries,
    signals: readonly number[],
    stopRatio: number,
    profitRatio: number,
    stepsUsed = 0,
  ): { trial: TrialResult; stepsUsed: number } {
    let winCount = 0;
    let lossCount = 0;
    let openCount = 0;
    let cumulativeProfit = 0;
    let steps = stepsUsed;

    for (const signalIndex of signals) {
      const outcome = simulateTrade(series, signalIndex, stopRatio, profitRatio);
      steps += outcome.barsWalked;
      if (steps > this.maxSteps) {
        throw new Error(`Simulation step cap of ${this.maxSteps} exceeded`);
      }

      if (outcome.kind === "win") winCount++;
      else if (outcome.kind === "loss") lossCount++;
      else openCount++;
      cumulativeProfit += outcome.profit;
    }

    return {
      trial: {
        stopRatio,
        profitRatio,
        signalCount: signals.length,
        winCount,
        lossCount,
        openCount,
        winRate: winCount / signals.length,
        cumulativeProfit,
      },
      stepsUsed: steps,
    };
  }

  /**
   * Searches the stop × profit grid (stop ratios outer, profit ratios inner).
   *
   * A trial takes over as best when its win rate beats the best so far OR its
   * profit is at least the best so far. Later trials win ties on profit, so
   * the traversal order decides between them. No winning trial at all means
   * the instrument has no viable configuration.
   */
  search(series: PriceSeries): GridSearchResult {
    validatePriceSeries(series);
    const signals = entrySignalIndices(series);
    if (signals.length === 0) {
      throw new Error("No entry signals available in price series");
    }

    const pairs = this.grid.stopRatios.flatMap((stopRatio) =>
      this.grid.profitRatios.map((profitRatio) => ({ stopRatio, profitRatio })),
    );

    const initial: SearchState = {
      greatestAccuracy: 0,
      greatestMoney: 0,
      best: null,
      trials: [],
      stepsUsed: 0,
    };

    const final = pairs.reduce<SearchState>((state, { stopRatio, profitRatio }) => {
      const { trial, stepsUsed } = this.evaluateTrial(series, signals, stopRatio, profitRatio, state.stepsUsed);
      const trials = [...state.trials, trial];

      if (trial.winRate > state.greatestAccuracy || trial.cumulativeProfit >= state.greatestMoney) {
        return {
          greatestAccuracy: trial.winRate,
          greatestMoney: trial.cumulativeProfit,
          best: trial,
          trials,
          stepsUsed,
        };
      }
      return { ...state, trials, stepsUsed };
    }, initial);

    if (final.best === null || final.greatestAccuracy === 0) {
      return { viable: false, trials: final.trials };
    }

    return {
      viable: true,
      trials: final.trials,
      outcome: {
        bestStopRatio: final.best.stopRatio,
        bestProfitRatio: final.best.profitRatio,
        winRate: final.greatestAccuracy,
        cumulativeProfit: final.greatestMoney,
        signalCount: signals.length,
      },
    };
  }
}
