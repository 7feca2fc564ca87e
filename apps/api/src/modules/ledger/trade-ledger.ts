import type { DailySummary, HedgePair, Portfolio, Trade } from "@hedgebot/shared";

import { InvariantViolationError } from "../bot/trading-errors";
import { quotePnl, unrealizedPnl } from "./pnl";

export type PriceLookup = (symbol: string) => number | undefined;

export type ExitRecord = {
  exitPrice: number;
  reason: string;
  at: string;
  exitOrderId?: string;
};

/**
 * In-memory record of opened and closed trades. Trades are mutated once, on exit,
 * and never removed.
 */
export class TradeLedger {
  private readonly trades = new Map<string, Trade>();

  constructor(
    readonly initialBalance: number,
    trades: Trade[] = []
  ) {
    for (const trade of trades) this.trades.set(trade.id, trade);
  }

  recordEntry(trade: Trade): Trade {
    if (this.trades.has(trade.id)) {
      throw new InvariantViolationError(trade.symbol, `Trade ${trade.id} is already recorded`);
    }
    if (trade.exitPrice !== undefined || trade.closedAt !== undefined) {
      throw new InvariantViolationError(trade.symbol, `Trade ${trade.id} cannot be recorded as already closed`);
    }
    this.trades.set(trade.id, trade);
    return trade;
  }

  recordExit(tradeId: string, exit: ExitRecord): Trade {
    const trade = this.trades.get(tradeId);
    if (!trade) {
      throw new InvariantViolationError("*", `Unknown trade ${tradeId}`);
    }
    if (trade.closedAt !== undefined) {
      throw new InvariantViolationError(trade.symbol, `Trade ${tradeId} is already closed`);
    }

    const closed: Trade = {
      ...trade,
      exitPrice: exit.exitPrice,
      closedAt: exit.at,
      exitReason: exit.reason,
      exitOrderId: exit.exitOrderId,
      realizedPnl: quotePnl(trade.side, trade.entryPrice, exit.exitPrice, trade.amount)
    };
    this.trades.set(tradeId, closed);
    return closed;
  }

  get(tradeId: string): Trade | undefined {
    return this.trades.get(tradeId);
  }

  all(): Trade[] {
    return [...this.trades.values()];
  }

  openTrades(): Trade[] {
    return this.all().filter((t) => t.closedAt === undefined);
  }

  closedTrades(): Trade[] {
    return this.all().filter((t) => t.closedAt !== undefined);
  }

  /** Recomputed on every call; unrealized P&L only counts symbols the lookup can price. */
  snapshot(options: { priceOf?: PriceLookup; hedgePairs?: HedgePair[] } = {}): Portfolio {
    const closed = this.closedTrades();
    const open = this.openTrades();

    const totalPnl = closed.reduce((sum, t) => sum + (t.realizedPnl ?? 0), 0);
    let unrealized = 0;
    if (options.priceOf) {
      for (const trade of open) {
        const price = options.priceOf(trade.symbol);
        if (price !== undefined && Number.isFinite(price)) unrealized += unrealizedPnl(trade, price);
      }
    }

    const wins = closed.filter((t) => (t.realizedPnl ?? 0) > 0).length;
    const pairs = options.hedgePairs ?? [];

    return {
      initialBalance: this.initialBalance,
      balance: this.initialBalance + totalPnl,
      totalPnl,
      unrealizedPnl: unrealized,
      totalReturnPct: this.initialBalance > 0 ? (totalPnl / this.initialBalance) * 100 : 0,
      openTrades: open.length,
      closedTrades: closed.length,
      totalTrades: closed.length + open.length,
      activePairs: pairs.filter((p) => p.status !== "CLOSED").length,
      hedgedPairs: pairs.filter((p) => p.status === "HEDGED").length,
      winRate: closed.length > 0 ? (wins / closed.length) * 100 : 0
    };
  }

  /** `date` is a UTC `YYYY-MM-DD` day matched against each trade's close time. */
  dailySummary(date: string): DailySummary {
    const pnls = this.closedTrades()
      .filter((t) => t.closedAt?.startsWith(date))
      .map((t) => t.realizedPnl ?? 0);
    const wins = pnls.filter((pnl) => pnl > 0).length;

    return {
      date,
      trades: pnls.length,
      totalPnl: pnls.reduce((sum, pnl) => sum + pnl, 0),
      winRate: pnls.length > 0 ? (wins / pnls.length) * 100 : 0,
      bestTrade: pnls.length > 0 ? Math.max(...pnls) : 0,
      worstTrade: pnls.length > 0 ? Math.min(...pnls) : 0
    };
  }
}
