import type { DailySummary, Portfolio, Trade } from "@hedgebot/shared";

import { formatPrice } from "../strategy/signal-evaluator";

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function usd(value: number): string {
  const sign = value < 0 ? "-" : "";
  return `${sign}$${Math.abs(value).toFixed(2)}`;
}

function pct(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

export function formatEntry(trade: Trade): string {
  const lines = [
    `<b>${trade.side === "LONG" ? "LONG ENTRY" : "HEDGE SHORT"}</b> ${escapeHtml(trade.symbol)}`,
    `<b>Price:</b> ${formatPrice(trade.entryPrice)}`,
    `<b>Amount:</b> ${trade.amount.toFixed(6)}`,
    `<b>Margin:</b> ${usd(trade.size)} × ${trade.leverage}`,
    `<b>Reason:</b> ${escapeHtml(trade.entryReason)}`
  ];

  const indicators = Object.entries(trade.technicalIndicators);
  if (indicators.length > 0) {
    lines.push(`<b>Indicators:</b> ${indicators.map(([name, value]) => `${escapeHtml(name)}=${value.toFixed(2)}`).join(", ")}`);
  }
  if (trade.marketConditions) {
    const { trend, volatility, volume } = trade.marketConditions;
    lines.push(`<b>Market:</b> trend ${trend}, volatility ${volatility}, volume ${volume}`);
  }
  return lines.join("\n");
}

export function formatExit(trade: Trade): string {
  const pnl = trade.realizedPnl ?? 0;
  const margin = trade.size > 0 ? pnl / trade.size : 0;
  return [
    `<b>EXIT</b> ${escapeHtml(trade.symbol)} ${trade.side}`,
    `<b>Entry:</b> ${formatPrice(trade.entryPrice)}`,
    `<b>Exit:</b> ${formatPrice(trade.exitPrice ?? trade.entryPrice)}`,
    `<b>P&amp;L:</b> ${usd(pnl)} (${pct(margin)})`,
    `<b>Reason:</b> ${escapeHtml(trade.exitReason ?? "unknown")}`
  ].join("\n");
}

export function formatHedgeOpened(longTrade: Trade, shortTrade: Trade, longPnlFraction: number): string {
  return [
    `<b>HEDGE OPENED</b> ${escapeHtml(longTrade.symbol)}`,
    `<b>Long drawdown:</b> ${pct(longPnlFraction)}`,
    `<b>Short:</b> ${shortTrade.amount.toFixed(6)} @ ${formatPrice(shortTrade.entryPrice)}`,
    `<b>Margin:</b> ${usd(shortTrade.size)} × ${shortTrade.leverage}`
  ].join("\n");
}

export function formatHedgeClosed(longTrade: Trade, shortTrade: Trade, coverageRatio: number | null): string {
  const longPnl = longTrade.realizedPnl ?? 0;
  const shortPnl = shortTrade.realizedPnl ?? 0;
  return [
    `<b>HEDGE CLOSED</b> ${escapeHtml(longTrade.symbol)}`,
    `<b>Long:</b> ${formatPrice(longTrade.entryPrice)} → ${formatPrice(longTrade.exitPrice ?? longTrade.entryPrice)} (${usd(longPnl)})`,
    `<b>Short:</b> ${formatPrice(shortTrade.entryPrice)} → ${formatPrice(shortTrade.exitPrice ?? shortTrade.entryPrice)} (${usd(shortPnl)})`,
    `<b>Total P&amp;L:</b> ${usd(longPnl + shortPnl)}`,
    `<b>Coverage:</b> ${coverageRatio === null ? "n/a" : `${coverageRatio.toFixed(2)}x`}`
  ].join("\n");
}

export function formatError(message: string, symbol?: string): string {
  const lines = ["<b>TRADING ERROR</b>", `<b>Error:</b> ${escapeHtml(message)}`];
  if (symbol) lines.push(`<b>Symbol:</b> ${escapeHtml(symbol)}`);
  return lines.join("\n");
}

export function formatStatus(status: string, portfolio: Portfolio): string {
  return [
    `<b>BOT ${escapeHtml(status.toUpperCase())}</b>`,
    `<b>Balance:</b> ${usd(portfolio.balance)}`,
    `<b>Open trades:</b> ${portfolio.openTrades}`,
    `<b>Active pairs:</b> ${portfolio.activePairs} (${portfolio.hedgedPairs} hedged)`,
    `<b>Total P&amp;L:</b> ${usd(portfolio.totalPnl)}`
  ].join("\n");
}

export function formatDailySummary(summary: DailySummary): string {
  return [
    `<b>DAILY SUMMARY</b> ${summary.date}`,
    `<b>Trades:</b> ${summary.trades}`,
    `<b>Total P&amp;L:</b> ${usd(summary.totalPnl)}`,
    `<b>Win rate:</b> ${summary.winRate.toFixed(1)}%`,
    `<b>Best:</b> ${usd(summary.bestTrade)}`,
    `<b>Worst:</b> ${usd(summary.worstTrade)}`
  ].join("\n");
}
