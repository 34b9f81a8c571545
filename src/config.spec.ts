import { expect } from "chai";
import { describe, it } from "node:test";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults on an empty environment", () => {
    const config = loadConfig({});

    expect(config.symbols).to.deep.equal(["ABNB", "ADP", "AMZN", "TMUS", "AAPL", "TSLA", "MSFT"]);
    expect(config.grid.stopRatios).to.deep.equal([0.95, 0.96, 0.97, 0.98, 0.99, 1]);
    expect(config.grid.profitRatios).to.deep.equal([1.25, 1.5, 1.75, 2, 2.25, 2.5, 2.75, 3]);
    expect(config.signals).to.deep.equal({ emaSpan: 100, macdFast: 12, macdSlow: 26, macdSignal: 9, lookbackDays: 1825 });
    expect(config.positionFraction).to.equal(0.1);
    expect(config.tradeTime).to.equal("10:00");
    expect(config.alpaca).to.deep.equal({
      keyId: null,
      secretKey: null,
      baseUrl: "https://paper-api.alpaca.markets",
      dataUrl: "https://data.alpaca.markets",
    });
    expect(config.telegram).to.deep.equal({ botToken: null, chatId: null });
  });

  it("parses lists, numbers and credentials", () => {
    const config = loadConfig({
      SYMBOLS: " aapl, brk.b ,,msft ",
      STOP_RATIOS: "0.9,1",
      PROFIT_RATIOS: "2",
      EMA_SPAN: "50",
      MAX_SIMULATION_STEPS: "5000",
      TRADE_TIME: "15:45",
      ALPACA_API_KEY: "test-key",
      ALPACA_SECRET_KEY: "test-secret",
      TELEGRAM_BOT_TOKEN: "test-token",
      TELEGRAM_CHAT_ID: "-100",
    });

    expect(config.symbols).to.deep.equal(["AAPL", "BRK.B", "MSFT"]);
    expect(config.grid).to.deep.equal({ stopRatios: [0.9, 1], profitRatios: [2] });
    expect(config.signals.emaSpan).to.equal(50);
    expect(config.maxSimulationSteps).to.equal(5000);
    expect(config.tradeTime).to.equal("15:45");
    expect(config.alpaca.keyId).to.equal("test-key");
    expect(config.alpaca.secretKey).to.equal("test-secret");
    expect(config.telegram).to.deep.equal({ botToken: "test-token", chatId: "-100" });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ SYMBOLS: "  ", ALPACA_API_KEY: "" });
    expect(config.symbols).to.have.length(7);
    expect(config.alpaca.keyId).to.equal(null);
  });

  it("names every invalid variable", () => {
    expect(() => loadConfig({ STOP_RATIOS: "0.95,abc", POSITION_FRACTION: "2" })).to.throw(
      /Invalid configuration — STOP_RATIOS.*; POSITION_FRACTION/,
    );
  });

  it("rejects a ratio list with no entries", () => {
    expect(() => loadConfig({ PROFIT_RATIOS: ",," })).to.throw(/PROFIT_RATIOS/);
  });

  it("rejects a fast MACD span that is not below the slow one", () => {
    expect(() => loadConfig({ MACD_FAST: "26", MACD_SLOW: "26" })).to.throw(/MACD_FAST \(26\) must be below MACD_SLOW \(26\)/);
  });

  it("rejects a malformed trade time", () => {
    expect(() => loadConfig({ TRADE_TIME: "25:00" })).to.throw(/TRADE_TIME: expected HH:MM/);
  });
});
