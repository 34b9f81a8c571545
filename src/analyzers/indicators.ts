// ── Exponential moving average ───────────────────────────────────────────────

/**
 * Recursive EMA with alpha = 2 / (span + 1), seeded with the first defined
 * value. Leading `null`s are skipped; the output stays `null` until
 * `minPeriods` defined values have been seen.
 */
export function ema(values: readonly (number | null)[], span: number, minPeriods = 0): (number | null)[] {
  const alpha = 2 / (span + 1);
  const out: (number | null)[] = [];
  let current: number | null = null;
  let seen = 0;

  for (const value of values) {
    if (value === null) {
      out.push(current !== null && seen >= minPeriods ? current : null);
      continue;
    }
    current = current === null ? value : alpha * value + (1 - alpha) * current;
    seen++;
    out.push(seen >= minPeriods ? current : null);
  }

  return out;
}

// ── MACD ─────────────────────────────────────────────────────────────────────

export interface MACDPoint {
  macd: number | null;
  signal: number | null;
  histogram: number | null;
}

export function macd(closes: readonly number[], fast = 12, slow = 26, signalSpan = 9): MACDPoint[] {
  const fastEma = ema(closes, fast, fast);
  const slowEma = ema(closes, slow, slow);

  const line = closes.map((_, i) => {
    const f = fastEma[i];
    const s = slowEma[i];
    return f !== null && s !== null ? f - s : null;
  });
  const signalLine = ema(line, signalSpan, signalSpan);

  return line.map((m, i) => {
    const s = signalLine[i];
    return {
      macd: m,
      signal: s,
      histogram: m !== null && s !== null ? m - s : null,
    };
  });
}
