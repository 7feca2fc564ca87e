import crypto from "node:crypto";

import type { AppConfig, Candle, Decision, DecisionKind, HedgePair, Timeframe, Trade } from "@hedgebot/shared";
import { requiredCandles } from "@hedgebot/shared";

import {
  HEDGE_COVERAGE_REASON,
  assertHedgeable,
  evaluateCoverage,
  findActivePair,
  markClosed,
  markHedged,
  openPair,
  shouldTriggerHedge
} from "../hedge/hedge-pair";
import { ROI_EXIT_REASON, elapsedMinutes, shouldExitOnRoi } from "../hedge/roi-table";
import type { OrderPlacer } from "../integrations/trading.service";
import { amountForSize, tradePnlFraction, unrealizedPnl } from "../ledger/pnl";
import type { TradeLedger } from "../ledger/trade-ledger";
import type { Logger } from "../logging/pino-logger";
import type { Notifier } from "../notifications/notifications.service";
import type { SignalEvaluation } from "../strategy/signal-evaluator";
import { evaluateSignals, formatPrice } from "../strategy/signal-evaluator";
import { DataUnavailableError, InvariantViolationError, OrderRejectedError, TradingError, errorMessage } from "./trading-errors";

export const STOP_LOSS_REASON = "Stop loss reached";
export const KILL_SWITCH_REASON = "Manual kill switch";

/** Everything a pass reads and mutates. Built from the persisted snapshot, written back after. */
export type TradingContext = {
  config: AppConfig;
  symbols: string[];
  ledger: TradeLedger;
  hedgePairs: HedgePair[];
  /** Candle timestamp of the last action per symbol; one action per candle. */
  lastActionCandle: Record<string, number>;
};

export type TradingPassDeps = {
  getCandles(symbol: string, timeframe: Timeframe, limit: number): Promise<Candle[]>;
  orders: OrderPlacer;
  notifier: Notifier;
  logger: Logger;
  history?: { append(trade: Trade): void };
  newId?: () => string;
};

export type PassOutcome = {
  /** In the order they happened. */
  decisions: Decision[];
  errors: number;
};

function pct(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

function legPnl(trade: Trade, price: number): number {
  return trade.realizedPnl ?? unrealizedPnl(trade, price);
}

class TradingPass {
  private readonly decisions: Decision[] = [];
  private errors = 0;
  private readonly at: string;
  private readonly newId: () => string;

  constructor(
    private readonly ctx: TradingContext,
    private readonly deps: TradingPassDeps,
    private readonly now: Date
  ) {
    this.at = now.toISOString();
    this.newId = deps.newId ?? (() => crypto.randomUUID());
  }

  async run(): Promise<PassOutcome> {
    for (const symbol of this.ctx.symbols) {
      try {
        await this.processSymbol(symbol);
      } catch (err) {
        this.handleFailure(symbol, err);
      }
    }
    return this.outcome();
  }

  async closeAll(reason: string): Promise<PassOutcome> {
    const active = this.ctx.hedgePairs.filter((p) => p.status !== "CLOSED");
    for (const pair of active) {
      try {
        const price = await this.latestPrice(pair.symbol);
        await this.closePair(pair, price, reason, null);
      } catch (err) {
        this.handleFailure(pair.symbol, err);
      }
    }
    return this.outcome();
  }

  // A failed notification never turns into a trading error.
  private notify(send: (notifier: Notifier) => void): void {
    try {
      send(this.deps.notifier);
    } catch (err) {
      this.deps.logger.warn({ err: errorMessage(err) }, "Notification failed");
    }
  }

  private outcome(): PassOutcome {
    return { decisions: this.decisions, errors: this.errors };
  }

  private async fetchCandles(symbol: string): Promise<Candle[]> {
    const { trading, strategy } = this.ctx.config;
    const limit = Math.max(trading.candleLimit, requiredCandles(strategy));
    return await this.deps.getCandles(symbol, trading.timeframe, limit);
  }

  private async latestPrice(symbol: string): Promise<number> {
    const candles = await this.fetchCandles(symbol);
    const latest = candles.at(-1);
    if (!latest) throw new DataUnavailableError(symbol, "No candles to price the close");
    return latest.close;
  }

  private async processSymbol(symbol: string): Promise<void> {
    const signal = evaluateSignals(symbol, await this.fetchCandles(symbol), this.ctx.config.strategy);
    if (this.ctx.lastActionCandle[symbol] === signal.candleTs) return;

    const pair = findActivePair(this.ctx.hedgePairs, symbol);
    if (!pair) {
      await this.maybeEnter(signal);
      return;
    }

    const longTrade = this.requireTrade(pair, pair.longTradeId);
    if (pair.status === "HEDGED") {
      await this.manageHedged(pair, longTrade, signal);
    } else {
      await this.manageLongOpen(pair, longTrade, signal);
    }
  }

  private async maybeEnter(signal: SignalEvaluation): Promise<void> {
    if (!signal.entry) return;

    const { trading } = this.ctx.config;
    const activePairs = this.ctx.hedgePairs.filter((p) => p.status !== "CLOSED").length;
    if (activePairs >= trading.maxOpenPairs) {
      this.deps.logger.debug({ symbol: signal.symbol, activePairs }, "Entry signal ignored, max open pairs reached");
      return;
    }

    const fill = await this.deps.orders.placeOrder({
      symbol: signal.symbol,
      side: "BUY",
      positionSide: "LONG",
      amount: amountForSize(trading.longPositionSize, trading.leverage, signal.price),
      reduceOnly: false,
      leverage: trading.leverage,
      referencePrice: signal.price
    });

    const pairId = this.newId();
    const trade: Trade = {
      id: this.newId(),
      pairId,
      symbol: signal.symbol,
      side: "LONG",
      role: "ENTRY",
      entryPrice: fill.fillPrice,
      amount: fill.amount,
      size: trading.longPositionSize,
      leverage: trading.leverage,
      orderId: fill.orderId,
      openedAt: this.at,
      entryReason: signal.entryReason ?? "Entry signal",
      technicalIndicators: signal.indicators,
      marketConditions: signal.marketConditions
    };
    const pair = openPair({ id: pairId, symbol: signal.symbol, longTradeId: trade.id, at: this.at, pairs: this.ctx.hedgePairs });

    this.ctx.ledger.recordEntry(trade);
    this.ctx.hedgePairs = [...this.ctx.hedgePairs, pair];
    this.ctx.lastActionCandle[signal.symbol] = signal.candleTs;
    this.deps.history?.append(trade);

    this.deps.logger.info({ symbol: trade.symbol, tradeId: trade.id, price: trade.entryPrice }, "Long opened");
    this.record("ENTRY", `Opened long ${trade.symbol} @ ${formatPrice(trade.entryPrice)}: ${trade.entryReason}`, trade.symbol, {
      tradeId: trade.id,
      pairId,
      amount: trade.amount
    });
    this.notify((n) => n.entry(trade));
  }

  private async manageLongOpen(pair: HedgePair, longTrade: Trade, signal: SignalEvaluation): Promise<void> {
    const { hedge, trading, minimalRoi } = this.ctx.config;
    const fraction = tradePnlFraction(longTrade, signal.price);

    if (hedge.enabled && shouldTriggerHedge(fraction, hedge.triggerLoss)) {
      await this.openHedge(pair, longTrade, signal, fraction);
      return;
    }

    let reason: string | null = null;
    if (shouldExitOnRoi(minimalRoi, elapsedMinutes(longTrade.openedAt, this.now), fraction)) {
      reason = ROI_EXIT_REASON;
    } else if (trading.stopLoss !== null && fraction <= trading.stopLoss) {
      reason = STOP_LOSS_REASON;
    } else if (trading.exitOnSignal && signal.exit) {
      reason = signal.exitReason ?? "Exit signal";
    }
    if (!reason) return;

    await this.closePair(pair, signal.price, reason, null, signal.candleTs);
  }

  private async openHedge(pair: HedgePair, longTrade: Trade, signal: SignalEvaluation, fraction: number): Promise<void> {
    assertHedgeable(pair);
    const { trading, hedge } = this.ctx.config;

    const fill = await this.deps.orders.placeOrder({
      symbol: pair.symbol,
      side: "SELL",
      positionSide: "SHORT",
      amount: amountForSize(trading.shortPositionSize, longTrade.leverage, signal.price),
      reduceOnly: false,
      leverage: longTrade.leverage,
      referencePrice: signal.price
    });

    const shortTrade: Trade = {
      id: this.newId(),
      pairId: pair.id,
      symbol: pair.symbol,
      side: "SHORT",
      role: "HEDGE",
      entryPrice: fill.fillPrice,
      amount: fill.amount,
      size: trading.shortPositionSize,
      leverage: longTrade.leverage,
      orderId: fill.orderId,
      openedAt: this.at,
      entryReason: `Hedge at ${pct(fraction)} long drawdown (trigger ${pct(hedge.triggerLoss)})`,
      technicalIndicators: signal.indicators,
      marketConditions: signal.marketConditions
    };

    this.ctx.ledger.recordEntry(shortTrade);
    this.replacePair(markHedged(pair, shortTrade.id, this.at));
    this.ctx.lastActionCandle[pair.symbol] = signal.candleTs;
    this.deps.history?.append(shortTrade);

    this.deps.logger.info({ symbol: pair.symbol, pairId: pair.id, longPnl: fraction }, "Hedge opened");
    this.record("HEDGE", `Hedged ${pair.symbol} at ${pct(fraction)}: short ${shortTrade.amount} @ ${formatPrice(shortTrade.entryPrice)}`, pair.symbol, {
      pairId: pair.id,
      shortTradeId: shortTrade.id,
      longPnlFraction: fraction
    });
    this.notify((n) => n.hedgeOpened(longTrade, shortTrade, fraction));
  }

  private async manageHedged(pair: HedgePair, longTrade: Trade, signal: SignalEvaluation): Promise<void> {
    const shortTrade = this.requireTrade(pair, pair.shortTradeId);
    const coverage = evaluateCoverage(
      legPnl(longTrade, signal.price),
      legPnl(shortTrade, signal.price),
      this.ctx.config.hedge.minCoverageRatio
    );

    // A leg already closed means an earlier close attempt failed half way: finish it.
    const closing = longTrade.closedAt !== undefined || shortTrade.closedAt !== undefined;
    if (!closing && !coverage.shouldClose) return;

    await this.closePair(pair, signal.price, HEDGE_COVERAGE_REASON, coverage.coverageRatio, signal.candleTs);
  }

  /**
   * Closes every open leg with reduce-only orders. A leg that fails stays open, the pair
   * keeps its status and the first rejection is rethrown after the others were tried.
   */
  private async closePair(pair: HedgePair, price: number, reason: string, coverageRatio: number | null, candleTs?: number): Promise<void> {
    const longTrade = this.requireTrade(pair, pair.longTradeId);
    const shortTrade = pair.shortTradeId === undefined ? null : this.requireTrade(pair, pair.shortTradeId);

    let failure: OrderRejectedError | null = null;
    const closed: Trade[] = [];
    for (const leg of [longTrade, shortTrade]) {
      if (!leg || leg.closedAt !== undefined) continue;
      try {
        closed.push(await this.closeLeg(leg, price, reason));
      } catch (err) {
        if (!(err instanceof OrderRejectedError)) throw err;
        failure ??= err;
      }
    }

    if (failure) {
      if (closed.length > 0) {
        this.record("EXIT", `Closed ${closed.length} leg(s) of ${pair.symbol}, retrying the rest next pass`, pair.symbol, {
          pairId: pair.id,
          tradeIds: closed.map((t) => t.id)
        });
      }
      throw failure;
    }

    this.replacePair(markClosed(pair, { reason, at: this.at, coverageRatio }));
    if (candleTs !== undefined) this.ctx.lastActionCandle[pair.symbol] = candleTs;

    const finalLong = this.requireTrade(pair, pair.longTradeId);
    const finalShort = pair.shortTradeId === undefined ? null : this.requireTrade(pair, pair.shortTradeId);
    const total = (finalLong.realizedPnl ?? 0) + (finalShort?.realizedPnl ?? 0);

    this.deps.logger.info({ symbol: pair.symbol, pairId: pair.id, reason, pnl: total }, "Pair closed");
    this.record("EXIT", `Closed ${pair.symbol}: ${reason}`, pair.symbol, {
      pairId: pair.id,
      realizedPnl: total,
      ...(coverageRatio !== null ? { coverageRatio } : {})
    });
    if (finalShort) {
      this.notify((n) => n.hedgeClosed(finalLong, finalShort, coverageRatio));
    } else {
      this.notify((n) => n.exit(finalLong));
    }
  }

  private async closeLeg(trade: Trade, price: number, reason: string): Promise<Trade> {
    const fill = await this.deps.orders.placeOrder({
      symbol: trade.symbol,
      side: trade.side === "LONG" ? "SELL" : "BUY",
      positionSide: trade.side,
      amount: trade.amount,
      reduceOnly: true,
      leverage: trade.leverage,
      referencePrice: price
    });
    const closed = this.ctx.ledger.recordExit(trade.id, {
      exitPrice: fill.fillPrice,
      reason,
      at: this.at,
      exitOrderId: fill.orderId
    });
    this.deps.history?.append(closed);
    return closed;
  }

  private requireTrade(pair: HedgePair, tradeId: string | undefined): Trade {
    const trade = tradeId === undefined ? undefined : this.ctx.ledger.get(tradeId);
    if (!trade) {
      throw new InvariantViolationError(pair.symbol, `Pair ${pair.id} references missing trade ${tradeId ?? "(none)"}`);
    }
    return trade;
  }

  private replacePair(next: HedgePair): void {
    this.ctx.hedgePairs = this.ctx.hedgePairs.map((p) => (p.id === next.id ? next : p));
  }

  private record(kind: DecisionKind, summary: string, symbol?: string, details?: Record<string, unknown>): void {
    this.decisions.push({
      id: this.newId(),
      ts: this.at,
      kind,
      summary,
      ...(symbol ? { symbol } : {}),
      ...(details ? { details } : {})
    });
  }

  private handleFailure(symbol: string, err: unknown): void {
    const message = errorMessage(err);
    if (err instanceof DataUnavailableError) {
      this.deps.logger.warn({ symbol, err: message }, "Symbol skipped, market data unavailable");
      this.record("SKIP", `${symbol} skipped: ${message}`, symbol, { kind: err.kind });
      return;
    }

    this.errors += 1;
    const kind = err instanceof TradingError ? err.kind : "UNEXPECTED";
    this.deps.logger.error({ symbol, kind, err: message }, "Symbol pass failed");
    this.record("ERROR", `${symbol}: ${message}`, symbol, { kind });
    if (err instanceof OrderRejectedError || err instanceof InvariantViolationError) {
      this.notify((n) => n.error(message, symbol));
    }
  }
}

/**
 * One evaluation pass over `ctx.symbols`. Each symbol is isolated: a failure is logged,
 * recorded as a decision and never stops the others. Mutates `ctx` in place.
 */
export async function runTradingPass(ctx: TradingContext, deps: TradingPassDeps, now = new Date()): Promise<PassOutcome> {
  return await new TradingPass(ctx, deps, now).run();
}

/** Closes every active pair at the latest closed price, leg by leg. */
export async function closeAllPositions(
  ctx: TradingContext,
  deps: TradingPassDeps,
  reason = KILL_SWITCH_REASON,
  now = new Date()
): Promise<PassOutcome> {
  return await new TradingPass(ctx, deps, now).closeAll(reason);
}
