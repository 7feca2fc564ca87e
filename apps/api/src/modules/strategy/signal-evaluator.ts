import type { Candle, MarketConditions, StrategySettings } from "@hedgebot/shared";
import { requiredCandles } from "@hedgebot/shared";

import { DataUnavailableError } from "../bot/trading-errors";
import { atrPct, ema, ewo, last, rsi, sma } from "./indicators";

export type SignalEvaluation = {
  symbol: string;
  price: number;
  candleTs: number;
  entry: boolean;
  exit: boolean;
  entryReason: string | null;
  exitReason: string | null;
  indicators: Record<string, number>;
  marketConditions: MarketConditions;
};

const MIN_PRICE = 0.5;
const VOLUME_WINDOW = 20;

export function formatPrice(price: number): string {
  return price >= 1 ? price.toFixed(2) : price.toFixed(6);
}

export function classifyMarketConditions(params: {
  closes: number[];
  highs: number[];
  lows: number[];
  volumes: number[];
  fastEma: number;
  slowEma: number;
}): MarketConditions {
  const { closes, highs, lows, volumes, fastEma, slowEma } = params;

  const spreadPct = Number.isFinite(fastEma) && Number.isFinite(slowEma) && slowEma > 0 ? ((fastEma - slowEma) / slowEma) * 100 : 0;
  const trend = spreadPct > 0.5 ? "BULLISH" : spreadPct < -0.5 ? "BEARISH" : "SIDEWAYS";

  const atr = atrPct(highs, lows, closes) ?? 0;
  const volatility = atr >= 2 ? "HIGH" : atr >= 0.75 ? "MEDIUM" : "LOW";

  const lastVolume = last(volumes);
  const window = volumes.slice(Math.max(0, volumes.length - 1 - VOLUME_WINDOW), volumes.length - 1);
  const meanVolume = window.length > 0 ? window.reduce((a, b) => a + b, 0) / window.length : 0;
  const ratio = meanVolume > 0 ? lastVolume / meanVolume : 1;
  const volume = ratio >= 1.5 ? "HIGH" : ratio <= 0.5 ? "LOW" : "NORMAL";

  return { trend, volatility, volume };
}

/**
 * Evaluates the moving-average pullback strategy on the latest closed bar.
 * Throws DataUnavailableError when the series is too short for every indicator.
 */
export function evaluateSignals(symbol: string, candles: Candle[], strategy: StrategySettings): SignalEvaluation {
  const needed = requiredCandles(strategy);
  if (candles.length < needed) {
    throw new DataUnavailableError(symbol, `Need ${needed} candles, got ${candles.length}`);
  }

  const closes = candles.map((c) => c.close);
  const highs = candles.map((c) => c.high);
  const lows = candles.map((c) => c.low);
  const volumes = candles.map((c) => c.volume);
  const latest = candles[candles.length - 1];
  const close = latest.close;

  const emaBuy = last(ema(closes, strategy.baseNbCandlesBuy));
  const emaSell = last(ema(closes, strategy.baseNbCandlesSell));
  const ewoValue = last(ewo(closes, strategy.fastEwo, strategy.slowEwo));
  const rsiValue = last(rsi(closes, 14));
  const smaSlow = last(sma(closes, strategy.slowEwo));

  const buyLine = emaBuy * strategy.lowOffset;
  const sellLine = emaSell * strategy.highOffset;
  const tradable = close > MIN_PRICE && latest.volume > 0;
  const belowBuyLine = close < buyLine;

  const ewoHighBranch = ewoValue > strategy.ewoHigh && rsiValue < strategy.rsiBuy;
  const ewoLowBranch = ewoValue < strategy.ewoLow;
  const entry = tradable && belowBuyLine && (ewoHighBranch || ewoLowBranch);
  const exit = latest.volume > 0 && close > sellLine;

  let entryReason: string | null = null;
  if (entry) {
    const parts: string[] = [];
    if (ewoHighBranch) {
      parts.push(`EWO high (${ewoValue.toFixed(2)} > ${strategy.ewoHigh})`, `RSI ${rsiValue.toFixed(2)} < ${strategy.rsiBuy}`);
    } else {
      parts.push(`EWO low (${ewoValue.toFixed(2)} < ${strategy.ewoLow})`);
    }
    parts.push(`close ${formatPrice(close)} below EMA${strategy.baseNbCandlesBuy} × ${strategy.lowOffset}`);
    entryReason = parts.join(", ");
  }

  const exitReason = exit
    ? `Exit signal: close ${formatPrice(close)} above EMA${strategy.baseNbCandlesSell} × ${strategy.highOffset}`
    : null;

  const indicators: Record<string, number> = {};
  const put = (name: string, value: number): void => {
    if (Number.isFinite(value)) indicators[name] = value;
  };
  put("close", close);
  put("rsi", rsiValue);
  put("ewo", ewoValue);
  put(`ema_buy_${strategy.baseNbCandlesBuy}`, emaBuy);
  put(`ema_sell_${strategy.baseNbCandlesSell}`, emaSell);
  put(`sma_${strategy.slowEwo}`, smaSlow);

  return {
    symbol,
    price: close,
    candleTs: latest.timestamp,
    entry,
    exit,
    entryReason,
    exitReason,
    indicators,
    marketConditions: classifyMarketConditions({ closes, highs, lows, volumes, fastEma: emaBuy, slowEma: emaSell })
  };
}
