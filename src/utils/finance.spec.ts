import { expect } from "chai";
import { describe, it } from "node:test";
import { BracketInputs, bracketLevels, planBracketOrder, round2 } from "./finance";

const BASE: BracketInputs = {
  cash: 10_000,
  winRate: 0.6,
  latestPrice: 95,
  baseline: 92.4,
  stopRatio: 0.97,
  profitRatio: 2,
};

describe("round2", () => {
  it("rounds to cents", () => {
    expect(round2(89.628)).to.equal(89.63);
    expect(round2(10)).to.equal(10);
  });
});

describe("bracketLevels", () => {
  it("derives the take-profit from the rounded stop", () => {
    expect(bracketLevels(92.4, 0.97, 2)).to.deep.equal({ stopLoss: 89.63, takeProfit: 179.26 });
  });
});

describe("planBracketOrder", () => {
  it("sizes the position by cash, fraction and win rate", () => {
    expect(planBracketOrder(BASE)).to.deep.equal({
      ok: true,
      plan: { qty: 6, notional: 600, entryPrice: 95, stopLoss: 89.63, takeProfit: 179.26 },
    });
  });

  it("honours a custom position fraction", () => {
    const decision = planBracketOrder({ ...BASE, positionFraction: 0.2 });
    expect(decision.ok).to.equal(true);
    if (!decision.ok) return;
    expect(decision.plan.notional).to.equal(1200);
    expect(decision.plan.qty).to.equal(12);
  });

  it("skips when no price is known", () => {
    expect(planBracketOrder({ ...BASE, latestPrice: 0 })).to.deep.equal({
      ok: false,
      reason: "latest price unavailable",
    });
  });

  it("skips when the notional buys less than one share", () => {
    expect(planBracketOrder({ ...BASE, cash: 100, winRate: 0.5 })).to.deep.equal({
      ok: false,
      reason: "notional $5 buys less than one share at $95",
    });
  });

  it("skips when the stop is not below the price", () => {
    expect(planBracketOrder({ ...BASE, baseline: 100, stopRatio: 1 })).to.deep.equal({
      ok: false,
      reason: "stop-loss $100 is not below the latest price $95",
    });
  });

  it("skips when the target is not above the price", () => {
    expect(planBracketOrder({ ...BASE, profitRatio: 1.01 })).to.deep.equal({
      ok: false,
      reason: "take-profit $90.53 is not above the latest price $95",
    });
  });
});
