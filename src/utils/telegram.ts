import { Telegram } from "telegraf";
import { scopedLogger } from "./logger";
import type { PlacedOrder } from "../brokers/alpaca";
import type { InstrumentRecord, RunReport } from "../analyzers/universe";
import type { BracketPlan } from "./finance";

const logger = scopedLogger("telegram");

export interface TelegramCredentials {
  botToken: string | null;
  chatId: string | null;
}

// ── Formatting Helpers ────────────────────────────────────────────────────────

export function escapeMd(text: string): string {
  return text.replace(/[_*`\[\]]/g, "\\$&");
}

function pct(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatOrderAlert(symbol: string, plan: BracketPlan, order: PlacedOrder): string {
  return [
    `🟢 *LONG ${escapeMd(symbol)}*`,
    `Qty: ${plan.qty} @ ~$${plan.entryPrice.toFixed(2)} (notional $${plan.notional.toFixed(2)})`,
    `Take-profit: $${plan.takeProfit.toFixed(2)}`,
    `Stop-loss: $${plan.stopLoss.toFixed(2)}`,
    `Order: \`${escapeMd(order.id)}\` — ${escapeMd(order.status)}`,
  ].join("\n");
}

export function formatBacktestSummary(records: readonly InstrumentRecord[], report: RunReport): string {
  const lines = [`📈 *Backtest complete* — ${report.evaluated.length} evaluated`];
  for (const r of records) {
    if (r.outcome === null) continue;
    lines.push(
      `• ${escapeMd(r.symbol)}: stop ${r.outcome.bestStopRatio} / profit ${r.outcome.bestProfitRatio} — win ${pct(r.outcome.winRate)}`,
    );
  }
  if (report.removed.length > 0) lines.push(`Removed: ${report.removed.map(escapeMd).join(", ")}`);
  if (report.failed.length > 0) lines.push(`Failed: ${report.failed.map((f) => escapeMd(f.symbol)).join(", ")}`);
  return lines.join("\n");
}

// ── Sender ────────────────────────────────────────────────────────────────────

export class TelegramNotifier {
  private bot: Telegram | null = null;

  constructor(private readonly credentials: TelegramCredentials) {}

  get enabled(): boolean {
    return Boolean(this.credentials.botToken && this.credentials.chatId);
  }

  private getBot(): Telegram | null {
    if (!this.credentials.botToken || !this.credentials.chatId) return null;
    if (!this.bot) this.bot = new Telegram(this.credentials.botToken);
    return this.bot;
  }

  /** Never throws; a failed send is logged. */
  async send(message: string): Promise<void> {
    const tg = this.getBot();
    const chat = this.credentials.chatId;
    if (!tg || !chat) {
      logger.debug("Telegram not configured (missing TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID)");
      return;
    }

    const chatId = /^-?\d+$/.test(chat) ? Number(chat) : chat;
    try {
      await tg.sendMessage(chatId, message, { parse_mode: "Markdown" });
      logger.info("Telegram alert sent successfully");
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`Telegram send failed: ${msg}`);
    }
  }

  async orderAlert(symbol: string, plan: BracketPlan, order: PlacedOrder): Promise<void> {
    await this.send(formatOrderAlert(symbol, plan, order));
  }

  async backtestSummary(records: readonly InstrumentRecord[], report: RunReport): Promise<void> {
    await this.send(formatBacktestSummary(records, report));
  }
}
