import { expect } from "chai";
import { describe, it } from "node:test";
import { Backtester, PriceStep, entrySignalIndices, simulateTrade, validatePriceSeries } from "./backtester";

function day(i: number): string {
  return new Date(Date.UTC(2024, 0, 1 + i)).toISOString().split("T")[0];
}

/** Bars from [close, entrySignal?] pairs; baseline is 100 throughout. */
function series(...bars: [number, boolean?][]): PriceStep[] {
  return bars.map(([close, entrySignal], i) => ({
    date: day(i),
    close,
    baseline: 100,
    entrySignal: entrySignal ?? false,
  }));
}

describe("simulateTrade", () => {
  it("reports a loss of entry close minus stop when the next close drops below the stop", () => {
    const bars = series([102, true], [90]);
    const outcome = simulateTrade(bars, 0, 0.95, 1.5);
    expect(outcome.kind).to.equal("loss");
    expect(outcome.exitIndex).to.equal(1);
    expect(outcome.profit).to.be.closeTo(-7, 1e-9);
  });

  it("counts a close exactly at the target as a win credited the target level", () => {
    const bars = series([60, true], [100]).map((b) => ({ ...b, baseline: 50 }));
    const outcome = simulateTrade(bars, 0, 1, 2);
    expect(outcome).to.deep.equal({ kind: "win", profit: 100, exitIndex: 1, barsWalked: 2 });
  });

  it("counts a close exactly at the stop as a loss", () => {
    const bars = series([60, true], [50]).map((b) => ({ ...b, baseline: 50 }));
    const outcome = simulateTrade(bars, 0, 1, 2);
    expect(outcome).to.deep.equal({ kind: "loss", profit: -10, exitIndex: 1, barsWalked: 2 });
  });

  it("leaves a trade open when neither level is reached before the data ends", () => {
    const bars = series([102, true], [110], [120]);
    const outcome = simulateTrade(bars, 0, 0.95, 1.5);
    expect(outcome).to.deep.equal({ kind: "open", profit: 0, exitIndex: null, barsWalked: 3 });
  });

  it("checks the signal bar itself before walking forward", () => {
    const bars = series([200, true], [50]);
    const outcome = simulateTrade(bars, 0, 0.95, 1.1);
    expect(outcome.kind).to.equal("win");
    expect(outcome.exitIndex).to.equal(0);
    expect(outcome.profit).to.be.closeTo(104.5, 1e-9);
  });
});

describe("validatePriceSeries", () => {
  it("rejects an empty series", () => {
    expect(() => validatePriceSeries([])).to.throw(/price series is empty/);
  });

  it("rejects dates that do not move forward", () => {
    const bars = series([102, true], [110]);
    bars[1] = { ...bars[1], date: bars[0].date };
    expect(() => validatePriceSeries(bars)).to.throw(/Malformed price series at 1\.date/);
  });

  it("rejects non-finite prices", () => {
    const bars = series([102, true], [NaN]);
    expect(() => validatePriceSeries(bars)).to.throw(/Malformed price series at 1\.close/);
  });

  it("accepts a chronological series", () => {
    expect(() => validatePriceSeries(series([102, true], [110]))).to.not.throw();
  });
});

describe("entrySignalIndices", () => {
  it("lists the bars where the entry signal fired", () => {
    expect(entrySignalIndices(series([1], [2, true], [3], [4, true]))).to.deep.equal([1, 3]);
  });
});

describe("Backtester", () => {
  it("rejects an empty ratio list", () => {
    expect(() => new Backtester({ stopRatios: [], profitRatios: [1.5] })).to.throw(/stop ratio/);
    expect(() => new Backtester({ stopRatios: [0.95], profitRatios: [0] })).to.throw(/profit ratio/);
  });

  it("keeps its own frozen copy of the grid", () => {
    const stops = [0.95, 1];
    const backtester = new Backtester({ stopRatios: stops, profitRatios: [1.5] });
    stops.push(2);
    expect(backtester.grid.stopRatios).to.deep.equal([0.95, 1]);
    expect(Object.isFrozen(backtester.grid.stopRatios)).to.equal(true);
  });

  describe("evaluateTrial", () => {
    it("keeps unresolved trades in the win-rate denominator", () => {
      const backtester = new Backtester({ stopRatios: [0.95], profitRatios: [1.5] });
      const bars = series([102, true], [150], [102, true], [120]);
      const { trial, stepsUsed } = backtester.evaluateTrial(bars, [0, 2], 0.95, 1.5);

      expect(trial.winCount).to.equal(1);
      expect(trial.openCount).to.equal(1);
      expect(trial.lossCount).to.equal(0);
      expect(trial.signalCount).to.equal(2);
      expect(trial.winRate).to.equal(0.5);
      expect(trial.cumulativeProfit).to.be.closeTo(142.5, 1e-9);
      expect(stepsUsed).to.equal(4);
    });
  });

  describe("search", () => {
    it("selects a pair that wins every signal", () => {
      const backtester = new Backtester({ stopRatios: [0.95], profitRatios: [1.1] });
      const result = backtester.search(series([102, true], [200]));

      expect(result.viable).to.equal(true);
      if (!result.viable) return;
      expect(result.outcome.bestStopRatio).to.equal(0.95);
      expect(result.outcome.bestProfitRatio).to.equal(1.1);
      expect(result.outcome.winRate).to.equal(1);
      expect(result.outcome.cumulativeProfit).to.be.closeTo(104.5, 1e-9);
      expect(result.outcome.signalCount).to.equal(1);
    });

    it("has no viable configuration when nothing ever resolves", () => {
      const backtester = new Backtester({ stopRatios: [0.95, 1.0], profitRatios: [1.5, 2.0] });
      const result = backtester.search(series([102, true], [110], [120]));

      expect(result.viable).to.equal(false);
      expect(result.trials).to.have.length(4);
      for (const trial of result.trials) {
        expect(trial.winRate).to.equal(0);
        expect(trial.cumulativeProfit).to.equal(0);
      }
    });

    it("has no viable configuration when every trade is stopped out", () => {
      const backtester = new Backtester({ stopRatios: [0.95], profitRatios: [1.5] });
      expect(backtester.search(series([102, true], [90])).viable).to.equal(false);
    });

    it("walks stop ratios in the outer loop and profit ratios in the inner loop", () => {
      const backtester = new Backtester({ stopRatios: [0.95, 1.0], profitRatios: [1.5, 2.0] });
      const result = backtester.search(series([102, true], [110], [120]));
      expect(result.trials.map((t) => [t.stopRatio, t.profitRatio])).to.deep.equal([
        [0.95, 1.5],
        [0.95, 2.0],
        [1.0, 1.5],
        [1.0, 2.0],
      ]);
    });

    it("lets a later trial with at least the best profit override a higher win rate", () => {
      const backtester = new Backtester({ stopRatios: [1.0], profitRatios: [1.2, 2.0] });
      const bars = series(
        [110, true], [125], [210],
        [110, true], [125], [95],
        [110, true], [125], [210],
      );
      const result = backtester.search(bars);

      expect(result.trials[0].winRate).to.equal(1);
      expect(result.trials[0].cumulativeProfit).to.be.closeTo(360, 1e-9);
      expect(result.trials[1].winCount).to.equal(2);
      expect(result.trials[1].cumulativeProfit).to.be.closeTo(390, 1e-9);

      expect(result.viable).to.equal(true);
      if (!result.viable) return;
      expect(result.outcome.bestProfitRatio).to.equal(2.0);
      expect(result.outcome.winRate).to.be.closeTo(2 / 3, 1e-12);
      expect(result.outcome.cumulativeProfit).to.be.closeTo(390, 1e-9);
    });

    it("gives a profit tie to the trial evaluated last", () => {
      // (0.8, 1.5) and (1.0, 1.2) share a 120 target and both win once
      const backtester = new Backtester({ stopRatios: [0.8, 1.0], profitRatios: [1.5, 1.2] });
      const result = backtester.search(series([110, true], [130]));

      expect(result.viable).to.equal(true);
      if (!result.viable) return;
      expect(result.outcome.bestStopRatio).to.equal(1.0);
      expect(result.outcome.bestProfitRatio).to.equal(1.2);
      expect(result.outcome.cumulativeProfit).to.be.closeTo(120, 1e-9);
    });

    it("keeps every trial win rate within [0, 1]", () => {
      const backtester = new Backtester({
        stopRatios: [0.9, 0.95, 1.0],
        profitRatios: [1.1, 1.25, 1.5, 2.0],
      });
      const bars = series([110, true], [125], [96], [101, true], [140], [80], [105, true], [99]);
      for (const trial of backtester.search(bars).trials) {
        expect(trial.winRate).to.be.at.least(0);
        expect(trial.winRate).to.be.at.most(1);
      }
    });

    it("returns identical results for identical inputs", () => {
      const backtester = new Backtester({ stopRatios: [0.95, 1.0], profitRatios: [1.1, 1.5] });
      const bars = series([102, true], [120], [101, true], [94], [103, true], [150]);
      expect(backtester.search(bars)).to.deep.equal(backtester.search(bars));
    });

    it("fails fast when the series has no entry signals", () => {
      const backtester = new Backtester({ stopRatios: [0.95], profitRatios: [1.5] });
      expect(() => backtester.search(series([102], [110]))).to.throw(/No entry signals available/);
    });

    it("stops once the simulation step cap is exceeded", () => {
      const backtester = new Backtester({ stopRatios: [0.95], profitRatios: [1.5] }, { maxSteps: 2 });
      expect(() => backtester.search(series([102, true], [110], [120]))).to.throw(/step cap of 2 exceeded/);
    });
  });
});
