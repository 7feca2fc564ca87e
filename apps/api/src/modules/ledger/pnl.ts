import type { PositionSide, Trade } from "@hedgebot/shared";

/**
 * P&L conventions:
 * - quote P&L is the price difference times the base-asset amount,
 * - P&L fractions are returns on margin, i.e. the price move times leverage.
 */

export function quotePnl(side: PositionSide, entryPrice: number, exitPrice: number, amount: number): number {
  const diff = side === "LONG" ? exitPrice - entryPrice : entryPrice - exitPrice;
  return diff * amount;
}

export function pnlFraction(side: PositionSide, entryPrice: number, price: number, leverage: number): number {
  if (entryPrice <= 0) return 0;
  const move = side === "LONG" ? (price - entryPrice) / entryPrice : (entryPrice - price) / entryPrice;
  return move * leverage;
}

export function unrealizedPnl(trade: Trade, price: number): number {
  return quotePnl(trade.side, trade.entryPrice, price, trade.amount);
}

export function tradePnlFraction(trade: Trade, price: number): number {
  return pnlFraction(trade.side, trade.entryPrice, price, trade.leverage);
}

/** Base-asset quantity for a margin `size` opened at `price`. */
export function amountForSize(size: number, leverage: number, price: number): number {
  if (price <= 0) return 0;
  return (size * leverage) / price;
}
