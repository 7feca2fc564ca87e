import { describe, expect, it } from "vitest";

import type { HedgePair, Trade } from "@hedgebot/shared";

import { InvariantViolationError } from "../bot/trading-errors";
import { amountForSize, pnlFraction, quotePnl } from "./pnl";
import { TradeLedger } from "./trade-ledger";

function openTrade(overrides: Partial<Trade> = {}): Trade {
  return {
    id: "t-1",
    pairId: "p-1",
    symbol: "BTC/USDT",
    side: "LONG",
    role: "ENTRY",
    entryPrice: 100,
    amount: 1,
    size: 100,
    leverage: 1,
    orderId: "o-1",
    openedAt: "2026-01-01T00:00:00.000Z",
    entryReason: "test entry",
    technicalIndicators: {},
    ...overrides
  };
}

describe("pnl", () => {
  it("computes quote P&L per side", () => {
    expect(quotePnl("LONG", 100, 90, 1)).toBe(-10);
    expect(quotePnl("SHORT", 95, 90, 2)).toBe(10);
  });

  it("scales the P&L fraction by leverage", () => {
    expect(pnlFraction("LONG", 100, 95, 1)).toBe(-0.05);
    expect(pnlFraction("LONG", 100, 95, 10)).toBe(-0.5);
    expect(pnlFraction("SHORT", 100, 110, 2)).toBe(-0.2);
  });

  it("converts margin size to base amount", () => {
    expect(amountForSize(5, 10, 25)).toBe(2);
    expect(amountForSize(5, 10, 0)).toBe(0);
  });
});

describe("TradeLedger", () => {
  it("records exits with realized P&L and keeps the side", () => {
    const ledger = new TradeLedger(1_000);
    ledger.recordEntry(openTrade());
    ledger.recordEntry(openTrade({ id: "t-2", side: "SHORT", role: "HEDGE", entryPrice: 95, amount: 2, size: 190 }));

    const longClosed = ledger.recordExit("t-1", { exitPrice: 90, reason: "Hedge coverage reached", at: "2026-01-01T02:00:00.000Z" });
    const shortClosed = ledger.recordExit("t-2", { exitPrice: 90, reason: "Hedge coverage reached", at: "2026-01-01T02:00:00.000Z" });

    expect(longClosed.realizedPnl).toBe(-10);
    expect(longClosed.side).toBe("LONG");
    expect(shortClosed.realizedPnl).toBe(10);

    const portfolio = ledger.snapshot();
    expect(portfolio.totalPnl).toBe(0);
    expect(portfolio.balance).toBe(1_000);
    expect(portfolio.closedTrades).toBe(2);
    expect(portfolio.winRate).toBe(50);
  });

  it("rejects duplicate entries and double exits", () => {
    const ledger = new TradeLedger(100);
    ledger.recordEntry(openTrade());

    expect(() => ledger.recordEntry(openTrade())).toThrow(InvariantViolationError);

    ledger.recordExit("t-1", { exitPrice: 110, reason: "ROI target reached", at: "2026-01-01T01:00:00.000Z" });
    expect(() => ledger.recordExit("t-1", { exitPrice: 120, reason: "again", at: "2026-01-01T01:05:00.000Z" })).toThrow(
      "Trade t-1 is already closed"
    );
    expect(() => ledger.recordExit("missing", { exitPrice: 1, reason: "x", at: "2026-01-01T01:05:00.000Z" })).toThrow(
      "Unknown trade missing"
    );
  });

  it("summarizes the trades closed on one UTC day", () => {
    const ledger = new TradeLedger(1_000);
    ledger.recordEntry(openTrade());
    ledger.recordEntry(openTrade({ id: "t-2", pairId: "p-2" }));
    ledger.recordEntry(openTrade({ id: "t-3", pairId: "p-3" }));
    ledger.recordEntry(openTrade({ id: "t-4", pairId: "p-4" }));
    ledger.recordExit("t-1", { exitPrice: 105, reason: "ROI target reached", at: "2026-01-01T10:00:00.000Z" });
    ledger.recordExit("t-2", { exitPrice: 98, reason: "Stop loss reached", at: "2026-01-01T23:59:59.000Z" });
    ledger.recordExit("t-3", { exitPrice: 120, reason: "ROI target reached", at: "2026-01-02T00:00:00.000Z" });

    expect(ledger.dailySummary("2026-01-01")).toEqual({
      date: "2026-01-01",
      trades: 2,
      totalPnl: 3,
      winRate: 50,
      bestTrade: 5,
      worstTrade: -2
    });
    expect(ledger.dailySummary("2026-01-03").trades).toBe(0);
  });

  it("computes unrealized P&L from the supplied prices on every snapshot", () => {
    const ledger = new TradeLedger(100);
    ledger.recordEntry(openTrade());
    ledger.recordEntry(openTrade({ id: "t-2", symbol: "ETH/USDT", pairId: "p-2" }));

    const pairs: HedgePair[] = [
      { id: "p-1", symbol: "BTC/USDT", longTradeId: "t-1", status: "LONG_OPEN", createdAt: "2026-01-01T00:00:00.000Z" },
      {
        id: "p-2",
        symbol: "ETH/USDT",
        longTradeId: "t-2",
        shortTradeId: "t-3",
        status: "HEDGED",
        createdAt: "2026-01-01T00:00:00.000Z"
      }
    ];

    const prices: Record<string, number> = { "BTC/USDT": 104 };
    const first = ledger.snapshot({ priceOf: (s) => prices[s], hedgePairs: pairs });
    expect(first.unrealizedPnl).toBe(4);
    expect(first.activePairs).toBe(2);
    expect(first.hedgedPairs).toBe(1);

    prices["BTC/USDT"] = 98;
    expect(ledger.snapshot({ priceOf: (s) => prices[s] }).unrealizedPnl).toBe(-2);
    expect(ledger.snapshot().unrealizedPnl).toBe(0);
  });
});
