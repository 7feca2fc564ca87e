import type { HedgePair } from "@hedgebot/shared";

import { InvariantViolationError } from "../bot/trading-errors";

export const HEDGE_COVERAGE_REASON = "Hedge coverage reached";

export type CoverageEvaluation = {
  longPnl: number;
  shortPnl: number;
  combinedPnl: number;
  /** Short profit over long loss; null while the long leg is not losing. */
  coverageRatio: number | null;
  shouldClose: boolean;
};

export function findActivePair(pairs: HedgePair[], symbol: string): HedgePair | undefined {
  return pairs.find((p) => p.symbol === symbol && p.status !== "CLOSED");
}

export function openPair(params: { id: string; symbol: string; longTradeId: string; at: string; pairs: HedgePair[] }): HedgePair {
  const active = findActivePair(params.pairs, params.symbol);
  if (active) {
    throw new InvariantViolationError(params.symbol, `Pair ${active.id} is still ${active.status} for ${params.symbol}`);
  }
  return {
    id: params.id,
    symbol: params.symbol,
    longTradeId: params.longTradeId,
    status: "LONG_OPEN",
    createdAt: params.at
  };
}

/** The trigger fires at or below the threshold, so an exact hit hedges. */
export function shouldTriggerHedge(longPnlFraction: number, triggerLoss: number): boolean {
  return longPnlFraction <= triggerLoss;
}

/** Checked before the short order goes out, so a stale pair never gets a second short. */
export function assertHedgeable(pair: HedgePair): void {
  if (pair.status !== "LONG_OPEN") {
    throw new InvariantViolationError(pair.symbol, `Hedge trigger on pair ${pair.id} in state ${pair.status}`);
  }
}

export function markHedged(pair: HedgePair, shortTradeId: string, at: string): HedgePair {
  assertHedgeable(pair);
  return { ...pair, status: "HEDGED", shortTradeId, hedgedAt: at };
}

export function markClosed(pair: HedgePair, params: { reason: string; at: string; coverageRatio?: number | null }): HedgePair {
  if (pair.status === "CLOSED") {
    throw new InvariantViolationError(pair.symbol, `Pair ${pair.id} is already closed`);
  }
  return {
    ...pair,
    status: "CLOSED",
    closedAt: params.at,
    closeReason: params.reason,
    coverageRatio: params.coverageRatio ?? pair.coverageRatio
  };
}

export function evaluateCoverage(longPnl: number, shortPnl: number, minCoverageRatio = 1): CoverageEvaluation {
  const longLoss = Math.max(0, -longPnl);
  const combinedPnl = longPnl + shortPnl;
  if (longLoss === 0) {
    return { longPnl, shortPnl, combinedPnl, coverageRatio: null, shouldClose: combinedPnl >= 0 };
  }
  return {
    longPnl,
    shortPnl,
    combinedPnl,
    coverageRatio: shortPnl / longLoss,
    shouldClose: shortPnl >= minCoverageRatio * longLoss
  };
}
