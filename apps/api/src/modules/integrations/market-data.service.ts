import { Injectable } from "@nestjs/common";
import type { Candle, Timeframe } from "@hedgebot/shared";

import { DataUnavailableError, errorMessage } from "../bot/trading-errors";
import type { TickerSnapshot } from "./ccxt-futures-adapter";
import { ExchangeConnectionService } from "./exchange-connection.service";

const TIMEFRAME_MS: Record<Timeframe, number> = {
  "1m": 60_000,
  "3m": 180_000,
  "5m": 300_000,
  "15m": 900_000,
  "30m": 1_800_000,
  "1h": 3_600_000,
  "4h": 14_400_000,
  "1d": 86_400_000
};

export function timeframeToMs(timeframe: Timeframe): number {
  return TIMEFRAME_MS[timeframe];
}

/** Drops the trailing bar when it has not closed yet at `nowMs`. */
export function closedCandles(candles: Candle[], timeframe: Timeframe, nowMs: number): Candle[] {
  const latest = candles[candles.length - 1];
  if (latest && latest.timestamp + timeframeToMs(timeframe) > nowMs) {
    return candles.slice(0, -1);
  }
  return candles;
}

@Injectable()
export class MarketDataService {
  private readonly lastPrices = new Map<string, number>();

  constructor(private readonly connection: ExchangeConnectionService) {}

  /** Closed candles, oldest first. The last close becomes the symbol's reference price. */
  async getCandles(symbol: string, timeframe: Timeframe, limit: number, nowMs = Date.now()): Promise<Candle[]> {
    let raw: Candle[];
    try {
      raw = await this.connection.getAdapter().fetchCandles(symbol, timeframe, limit + 1);
    } catch (err) {
      throw new DataUnavailableError(symbol, `Candle fetch failed: ${errorMessage(err)}`, { cause: err });
    }

    const candles = closedCandles(raw, timeframe, nowMs).slice(-limit);
    const latest = candles[candles.length - 1];
    if (!latest) {
      throw new DataUnavailableError(symbol, "Exchange returned no closed candles");
    }
    this.lastPrices.set(symbol, latest.close);
    return candles;
  }

  async getTickers(): Promise<TickerSnapshot[]> {
    try {
      return await this.connection.getAdapter().fetchTickers();
    } catch (err) {
      throw new DataUnavailableError("*", `Ticker fetch failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  lastPrice(symbol: string): number | undefined {
    return this.lastPrices.get(symbol);
  }
}
