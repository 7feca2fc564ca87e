import { describe, expect, it } from "vitest";

import type { BotState, HedgePair, Trade } from "@hedgebot/shared";
import { defaultBotState } from "@hedgebot/shared";

import type { BotEngineService } from "../bot/bot-engine.service";
import { PortfolioService } from "./portfolio.service";

function trade(id: string, symbol: string, openedAt: string, closed = false): Trade {
  return {
    id,
    pairId: `pair-${id}`,
    symbol,
    side: "LONG",
    role: "ENTRY",
    entryPrice: 100,
    amount: 1,
    size: 10,
    leverage: 10,
    orderId: `o-${id}`,
    openedAt,
    entryReason: "test",
    technicalIndicators: {},
    ...(closed ? { exitPrice: 101, closedAt: "2026-02-02T00:00:00.000Z", exitReason: "ROI target reached", realizedPnl: 1 } : {})
  };
}

const pair = (id: string, status: HedgePair["status"], createdAt: string): HedgePair => ({
  id,
  symbol: "BTC/USDT",
  longTradeId: `t-${id}`,
  status,
  createdAt,
  ...(status === "CLOSED" ? { closedAt: "2026-02-03T00:00:00.000Z" } : {})
});

function service(state: Partial<BotState>): PortfolioService {
  const full: BotState = { ...defaultBotState(), ...state };
  return new PortfolioService({ getState: () => full } as unknown as BotEngineService);
}

describe("PortfolioService", () => {
  const trades = [
    trade("a", "BTC/USDT", "2026-02-01T00:00:00.000Z", true),
    trade("b", "ETH/USDT", "2026-02-03T00:00:00.000Z"),
    trade("c", "BTC/USDT", "2026-02-02T00:00:00.000Z")
  ];

  it("lists trades newest first with status and symbol filters", () => {
    const portfolio = service({ trades });

    expect(portfolio.getTrades().map((t) => t.id)).toEqual(["b", "c", "a"]);
    expect(portfolio.getTrades("open").map((t) => t.id)).toEqual(["b", "c"]);
    expect(portfolio.getTrades("closed").map((t) => t.id)).toEqual(["a"]);
    expect(portfolio.getTrades("all", "btc/usdt").map((t) => t.id)).toEqual(["c", "a"]);
  });

  it("filters hedge pairs by status", () => {
    const portfolio = service({
      hedgePairs: [pair("1", "CLOSED", "2026-02-01T00:00:00.000Z"), pair("2", "LONG_OPEN", "2026-02-02T00:00:00.000Z")]
    });

    expect(portfolio.getHedgePairs().map((p) => p.id)).toEqual(["2", "1"]);
    expect(portfolio.getHedgePairs("CLOSED").map((p) => p.id)).toEqual(["1"]);
  });
});
