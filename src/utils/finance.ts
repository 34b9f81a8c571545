/**
 * Position sizing and bracket levels for tuned MACD entries.
 *
 * Model: the wager scales with the backtested win rate.
 *
 *   Notional     = cash × POSITION_FRACTION × winRate   →  $10,000 × 0.1 × 0.6 = $600
 *   Shares       = floor(Notional / latest price)        →  $600 / $95 = 6 shares
 *   Stop-loss    = stopRatio × baseline EMA               →  0.97 × $92.40 = $89.63
 *   Take-profit  = profitRatio × stop-loss                →  2 × $89.63 = $179.26
 *
 * Bracket orders only take whole shares, so fractional quantities round down.
 */

export const DEFAULT_POSITION_FRACTION = 0.1;

export interface BracketLevels {
  stopLoss: number;
  takeProfit: number;
}

export interface BracketPlan extends BracketLevels {
  qty: number;
  notional: number;
  entryPrice: number;
}

export interface BracketInputs {
  cash: number;
  winRate: number;
  latestPrice: number;
  baseline: number;
  stopRatio: number;
  profitRatio: number;
  positionFraction?: number;
}

export type BracketDecision =
  | { ok: true; plan: BracketPlan }
  | { ok: false; reason: string };

export function round2(value: number): number {
  return parseFloat(value.toFixed(2));
}

/** Take-profit is derived from the already-rounded stop, matching what is sent. */
export function bracketLevels(baseline: number, stopRatio: number, profitRatio: number): BracketLevels {
  const stopLoss = round2(stopRatio * baseline);
  const takeProfit = round2(stopLoss * profitRatio);
  return { stopLoss, takeProfit };
}

export function planBracketOrder(inputs: BracketInputs): BracketDecision {
  const fraction = inputs.positionFraction ?? DEFAULT_POSITION_FRACTION;

  if (inputs.latestPrice <= 0) {
    return { ok: false, reason: "latest price unavailable" };
  }

  const notional = round2(inputs.cash * fraction * inputs.winRate);
  const qty = Math.floor(notional / inputs.latestPrice);
  if (qty < 1) {
    return { ok: false, reason: `notional $${notional} buys less than one share at $${inputs.latestPrice}` };
  }

  const { stopLoss, takeProfit } = bracketLevels(inputs.baseline, inputs.stopRatio, inputs.profitRatio);
  if (stopLoss >= inputs.latestPrice) {
    return { ok: false, reason: `stop-loss $${stopLoss} is not below the latest price $${inputs.latestPrice}` };
  }
  if (takeProfit <= inputs.latestPrice) {
    return { ok: false, reason: `take-profit $${takeProfit} is not above the latest price $${inputs.latestPrice}` };
  }

  return {
    ok: true,
    plan: { qty, notional, entryPrice: inputs.latestPrice, stopLoss, takeProfit },
  };
}
