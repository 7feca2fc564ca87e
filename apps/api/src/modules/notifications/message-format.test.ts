import { describe, expect, it } from "vitest";

import type { Trade } from "@hedgebot/shared";

import { escapeHtml, formatDailySummary, formatEntry, formatError, formatHedgeClosed } from "./message-format";

const longTrade: Trade = {
  id: "t-1",
  pairId: "p-1",
  symbol: "BTC/USDT",
  side: "LONG",
  role: "ENTRY",
  entryPrice: 100,
  exitPrice: 90,
  amount: 1,
  size: 100,
  leverage: 1,
  orderId: "o-1",
  openedAt: "2026-01-01T00:00:00.000Z",
  closedAt: "2026-01-01T02:00:00.000Z",
  entryReason: "EWO low (-20.00 < -17.457)",
  exitReason: "Hedge coverage reached",
  technicalIndicators: { rsi: 31.456 },
  marketConditions: { trend: "BEARISH", volatility: "HIGH", volume: "NORMAL" },
  realizedPnl: -10
};

const shortTrade: Trade = {
  ...longTrade,
  id: "t-2",
  side: "SHORT",
  role: "HEDGE",
  entryPrice: 95,
  amount: 2,
  size: 190,
  realizedPnl: 10
};

describe("message-format", () => {
  it("escapes HTML control characters", () => {
    expect(escapeHtml("a < b & c > d")).toBe("a &lt; b &amp; c &gt; d");
  });

  it("formats a hedge completion with total P&L and coverage", () => {
    expect(formatHedgeClosed(longTrade, shortTrade, 1)).toBe(
      [
        "<b>HEDGE CLOSED</b> BTC/USDT",
        "<b>Long:</b> 100.00 → 90.00 (-$10.00)",
        "<b>Short:</b> 95.00 → 90.00 ($10.00)",
        "<b>Total P&amp;L:</b> $0.00",
        "<b>Coverage:</b> 1.00x"
      ].join("\n")
    );
  });

  it("includes the entry reason, indicators and market conditions", () => {
    const { exitPrice: _e, closedAt: _c, exitReason: _r, realizedPnl: _p, ...open } = longTrade;
    const lines = formatEntry(open).split("\n");

    expect(lines[0]).toBe("<b>LONG ENTRY</b> BTC/USDT");
    expect(lines).toContain("<b>Reason:</b> EWO low (-20.00 &lt; -17.457)");
    expect(lines).toContain("<b>Indicators:</b> rsi=31.46");
    expect(lines).toContain("<b>Market:</b> trend BEARISH, volatility HIGH, volume NORMAL");
  });

  it("formats errors with the symbol", () => {
    expect(formatError("Order rejected: <timeout>", "ETH/USDT")).toBe(
      "<b>TRADING ERROR</b>\n<b>Error:</b> Order rejected: &lt;timeout&gt;\n<b>Symbol:</b> ETH/USDT"
    );
  });

  it("formats the daily summary", () => {
    expect(
      formatDailySummary({ date: "2026-01-01", trades: 2, totalPnl: 3, winRate: 50, bestTrade: 5, worstTrade: -2 })
    ).toBe(
      [
        "<b>DAILY SUMMARY</b> 2026-01-01",
        "<b>Trades:</b> 2",
        "<b>Total P&amp;L:</b> $3.00",
        "<b>Win rate:</b> 50.0%",
        "<b>Best:</b> $5.00",
        "<b>Worst:</b> -$2.00"
      ].join("\n")
    );
  });
});
