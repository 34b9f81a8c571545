import { z } from "zod";

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const csvList = z
  .string()
  .transform((raw) => raw.split(",").map((item) => item.trim()).filter((item) => item.length > 0));

const ratioList = csvList
  .transform((items) => items.map(Number))
  .pipe(z.array(z.number().finite().positive()).nonempty());

const symbolList = csvList
  .transform((items) => items.map((s) => s.toUpperCase()))
  .pipe(z.array(z.string().regex(/^[A-Z.\-]+$/, "symbols are letters, '.' or '-'")).nonempty());

const EnvSchema = z.object({
  SYMBOLS: symbolList.default("ABNB,ADP,AMZN,TMUS,AAPL,TSLA,MSFT"),
  STOP_RATIOS: ratioList.default("0.95,0.96,0.97,0.98,0.99,1"),
  PROFIT_RATIOS: ratioList.default("1.25,1.5,1.75,2,2.25,2.5,2.75,3"),
  EMA_SPAN: z.coerce.number().int().positive().default(100),
  MACD_FAST: z.coerce.number().int().positive().default(12),
  MACD_SLOW: z.coerce.number().int().positive().default(26),
  MACD_SIGNAL: z.coerce.number().int().positive().default(9),
  LOOKBACK_DAYS: z.coerce.number().int().positive().default(1825),
  MAX_SIMULATION_STEPS: z.coerce.number().int().positive().default(10_000_000),
  POSITION_FRACTION: z.coerce.number().gt(0).max(1).default(0.1),
  TRADE_TIME: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM").default("10:00"),
  ALPACA_API_KEY: z.string().min(1).optional(),
  ALPACA_SECRET_KEY: z.string().min(1).optional(),
  ALPACA_BASE_URL: z.string().url().default("https://paper-api.alpaca.markets"),
  ALPACA_DATA_URL: z.string().url().default("https://data.alpaca.markets"),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
});

// ── Types ────────────────────────────────────────────────────────────────────

export interface AppConfig {
  symbols: string[];
  grid: {
    stopRatios: number[];
    profitRatios: number[];
  };
  signals: {
    emaSpan: number;
    macdFast: number;
    macdSlow: number;
    macdSignal: number;
    lookbackDays: number;
  };
  maxSimulationSteps: number;
  positionFraction: number;
  tradeTime: string;
  alpaca: {
    keyId: string | null;
    secretKey: string | null;
    baseUrl: string;
    dataUrl: string;
  };
  telegram: {
    botToken: string | null;
    chatId: string | null;
  };
}

/**
 * Reads the environment into a typed config. Blank strings count as unset so
 * an `.env` copied from `.env.example` works without editing every line.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration — ${issues}`);
  }

  const e = result.data;
  if (e.MACD_FAST >= e.MACD_SLOW) {
    throw new Error(`Invalid configuration — MACD_FAST (${e.MACD_FAST}) must be below MACD_SLOW (${e.MACD_SLOW})`);
  }

  return {
    symbols: e.SYMBOLS,
    grid: {
      stopRatios: e.STOP_RATIOS,
      profitRatios: e.PROFIT_RATIOS,
    },
    signals: {
      emaSpan: e.EMA_SPAN,
      macdFast: e.MACD_FAST,
      macdSlow: e.MACD_SLOW,
      macdSignal: e.MACD_SIGNAL,
      lookbackDays: e.LOOKBACK_DAYS,
    },
    maxSimulationSteps: e.MAX_SIMULATION_STEPS,
    positionFraction: e.POSITION_FRACTION,
    tradeTime: e.TRADE_TIME,
    alpaca: {
      keyId: e.ALPACA_API_KEY ?? null,
      secretKey: e.ALPACA_SECRET_KEY ?? null,
      baseUrl: e.ALPACA_BASE_URL,
      dataUrl: e.ALPACA_DATA_URL,
    },
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN ?? null,
      chatId: e.TELEGRAM_CHAT_ID ?? null,
    },
  };
}
