import axios, { AxiosInstance, AxiosRequestConfig } from "axios";
import { z } from "zod";
import { scopedLogger } from "../utils/logger";
import { round2 } from "../utils/finance";

const logger = scopedLogger("alpaca");

const API_TIMEOUT = 10_000;

// ── Zod Schemas ──────────────────────────────────────────────────────────────
// Alpaca sends money and quantities as decimal strings.

const AccountResponseSchema = z.object({
  id: z.string(),
  status: z.string(),
  cash: z.coerce.number(),
  portfolio_value: z.coerce.number(),
  buying_power: z.coerce.number(),
});

const PositionResponseSchema = z.object({
  symbol: z.string(),
  qty: z.coerce.number(),
  avg_entry_price: z.coerce.number(),
  market_value: z.coerce.number(),
  unrealized_pl: z.coerce.number(),
});

const OrderResponseSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  side: z.enum(["buy", "sell"]),
  type: z.string(),
  status: z.string(),
  qty: z.string().nullable().optional(),
  order_class: z.string().optional(),
});

const LatestBarResponseSchema = z.object({
  symbol: z.string(),
  bar: z.object({
    t: z.string(),
    o: z.number(),
    h: z.number(),
    l: z.number(),
    c: z.number(),
    v: z.number(),
  }),
});

const ErrorResponseSchema = z.object({ message: z.string() });

// ── Types ────────────────────────────────────────────────────────────────────

export interface AlpacaCredentials {
  keyId: string | null;
  secretKey: string | null;
  baseUrl: string;
  dataUrl: string;
}

export interface AccountSummary {
  id: string;
  status: string;
  cash: number;
  portfolioValue: number;
  buyingPower: number;
}

export interface Position {
  symbol: string;
  qty: number;
  avgEntryPrice: number;
  marketValue: number;
  unrealizedPl: number;
}

export interface PlacedOrder {
  id: string;
  symbol: string;
  side: "buy" | "sell";
  type: string;
  status: string;
  qty: number | null;
  orderClass: string | null;
}

export interface BracketOrderRequest {
  symbol: string;
  qty: number;
  takeProfit: number;
  stopLoss: number;
}

/** What the live traders need from a brokerage. */
export interface Brokerage {
  getAccount(): Promise<AccountSummary | null>;
  getLatestPrice(symbol: string): Promise<number | null>;
  getPosition(symbol: string): Promise<Position | null>;
  submitBracketOrder(order: BracketOrderRequest): Promise<PlacedOrder | null>;
}

function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const body = ErrorResponseSchema.safeParse(err.response?.data);
    const detail = body.success ? body.data.message : err.message;
    return err.response ? `HTTP ${err.response.status} — ${detail}` : detail;
  }
  return err instanceof Error ? err.message : String(err);
}

function toPlacedOrder(raw: z.infer<typeof OrderResponseSchema>): PlacedOrder {
  return {
    id: raw.id,
    symbol: raw.symbol,
    side: raw.side,
    type: raw.type,
    status: raw.status,
    qty: raw.qty != null ? Number(raw.qty) : null,
    orderClass: raw.order_class ?? null,
  };
}

// ── Client ───────────────────────────────────────────────────────────────────

export class AlpacaClient implements Brokerage {
  private readonly trading: AxiosInstance;
  private readonly data: AxiosInstance;

  /** `overrides` is merged into both axios instances (tests pass an adapter). */
  constructor(credentials: AlpacaCredentials, overrides: AxiosRequestConfig = {}) {
    if (!credentials.keyId || !credentials.secretKey) {
      throw new Error("ALPACA_API_KEY and ALPACA_SECRET_KEY must be set to reach the brokerage");
    }

    const headers = {
      "APCA-API-KEY-ID": credentials.keyId,
      "APCA-API-SECRET-KEY": credentials.secretKey,
    };
    this.trading = axios.create({ baseURL: credentials.baseUrl, headers, timeout: API_TIMEOUT, ...overrides });
    this.data = axios.create({ baseURL: credentials.dataUrl, headers, timeout: API_TIMEOUT, ...overrides });
  }

  async getAccount(): Promise<AccountSummary | null> {
    try {
      const { data } = await this.trading.get("/v2/account");
      const parsed = AccountResponseSchema.parse(data);
      return {
        id: parsed.id,
        status: parsed.status,
        cash: parsed.cash,
        portfolioValue: parsed.portfolio_value,
        buyingPower: parsed.buying_power,
      };
    } catch (err) {
      logger.error(`Account lookup failed: ${describeError(err)}`);
      return null;
    }
  }

  /** `null` when nothing is held (Alpaca answers 404) or the lookup fails. */
  async getPosition(symbol: string): Promise<Position | null> {
    try {
      const { data } = await this.trading.get(`/v2/positions/${encodeURIComponent(symbol)}`);
      const p = PositionResponseSchema.parse(data);
      return {
        symbol: p.symbol,
        qty: p.qty,
        avgEntryPrice: p.avg_entry_price,
        marketValue: p.market_value,
        unrealizedPl: p.unrealized_pl,
      };
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 404) {
        logger.info(`You currently hold no ${symbol}`);
        return null;
      }
      logger.error(`Position lookup for ${symbol} failed: ${describeError(err)}`);
      return null;
    }
  }

  async getLatestPrice(symbol: string): Promise<number | null> {
    try {
      const { data } = await this.data.get(`/v2/stocks/${encodeURIComponent(symbol)}/bars/latest`);
      return LatestBarResponseSchema.parse(data).bar.c;
    } catch (err) {
      logger.warn(`Latest bar unavailable for ${symbol}: ${describeError(err)}`);
      return null;
    }
  }

  /** Market buy with attached take-profit limit and stop-loss legs. */
  async submitBracketOrder(order: BracketOrderRequest): Promise<PlacedOrder | null> {
    try {
      const { data } = await this.trading.post("/v2/orders", {
        symbol: order.symbol,
        qty: String(order.qty),
        side: "buy",
        type: "market",
        time_in_force: "day",
        order_class: "bracket",
        take_profit: { limit_price: round2(order.takeProfit).toFixed(2) },
        stop_loss: { stop_price: round2(order.stopLoss).toFixed(2) },
      });
      const placed = toPlacedOrder(OrderResponseSchema.parse(data));
      logger.info(
        `Bracket order placed: ${order.qty} ${order.symbol} | TP $${order.takeProfit.toFixed(2)} | SL $${order.stopLoss.toFixed(2)} (${placed.status})`,
      );
      return placed;
    } catch (err) {
      logger.error(`Error placing bracket order for ${order.symbol}: ${describeError(err)}`);
      return null;
    }
  }
}
