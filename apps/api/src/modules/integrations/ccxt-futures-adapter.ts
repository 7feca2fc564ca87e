import ccxt from "ccxt";
import type { Candle } from "@hedgebot/shared";

export type CcxtFuturesEnv = "MAINNET" | "TESTNET";

export type CcxtFuturesAdapterOptions = {
  env: CcxtFuturesEnv;
  apiKey?: string;
  apiSecret?: string;
  timeoutMs?: number;
};

export type TickerSnapshot = {
  symbol: string;
  last: number | null;
  quoteVolume: number | null;
};

export type MarketOrderFill = {
  orderId: string;
  fillPrice: number | null;
  filledAmount: number | null;
};

function asNumber(v: unknown): number | null {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string") {
    const n = Number.parseFloat(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

// An ACK response reports "0" for fields that are not known yet.
function asPositive(v: unknown): number | null {
  const n = asNumber(v);
  return n !== null && n > 0 ? n : null;
}

function asRecord(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== "object" || Array.isArray(v)) return null;
  return Object.fromEntries(Object.entries(v));
}

/** Binance answers -4059 when the account is already in the requested position mode. */
export function isPositionModeUnchanged(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err);
  return message.includes("-4059") || message.toLowerCase().includes("no need to change position side");
}

function asString(v: unknown): string | null {
  if (typeof v === "string" && v.trim()) return v.trim();
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return null;
}

/** Linear USD-M futures use `BASE/QUOTE:SETTLE`; the bot keeps the plain `BASE/QUOTE` form. */
export function toFuturesSymbol(symbol: string): string {
  const trimmed = symbol.trim().toUpperCase();
  if (trimmed.includes(":")) return trimmed;
  const quote = trimmed.split("/")[1];
  return quote ? `${trimmed}:${quote}` : trimmed;
}

export function fromFuturesSymbol(symbol: string): string {
  const idx = symbol.indexOf(":");
  return idx >= 0 ? symbol.slice(0, idx) : symbol;
}

export function parseOhlcvRows(raw: unknown): Candle[] {
  if (!Array.isArray(raw)) return [];
  const out: Candle[] = [];
  for (const row of raw) {
    if (!Array.isArray(row) || row.length < 6) continue;
    const [ts, open, high, low, close, volume] = row.map(asNumber);
    if (ts === null || open === null || high === null || low === null || close === null || volume === null) continue;
    out.push({ timestamp: ts, open, high, low, close, volume });
  }
  return out.sort((a, b) => a.timestamp - b.timestamp);
}

export function parseTickers(raw: unknown): TickerSnapshot[] {
  const tickers = asRecord(raw) ?? {};
  const out: TickerSnapshot[] = [];
  for (const [key, value] of Object.entries(tickers)) {
    const ticker = asRecord(value);
    if (!ticker) continue;
    const symbol = asString(ticker.symbol) ?? key;
    out.push({
      symbol: fromFuturesSymbol(symbol),
      last: asNumber(ticker.last) ?? asNumber(ticker.close),
      quoteVolume: asNumber(ticker.quoteVolume)
    });
  }
  return out;
}

export function parseOrderFill(raw: unknown): MarketOrderFill {
  const order = asRecord(raw) ?? {};
  const info = asRecord(order.info) ?? {};
  const orderId = asString(order.id) ?? asString(info.orderId);
  if (!orderId) {
    throw new Error("Exchange returned an order without an id");
  }
  return {
    orderId,
    fillPrice: asPositive(order.average) ?? asPositive(info.avgPrice) ?? asPositive(order.price),
    filledAmount: asPositive(order.filled) ?? asPositive(info.executedQty)
  };
}

type CcxtFuturesExchange = {
  loadMarkets(): Promise<unknown>;
  setSandboxMode(enabled: boolean): void;
  fetchOHLCV(symbol: string, timeframe?: string, since?: number, limit?: number): Promise<unknown>;
  fetchTickers(symbols?: string[]): Promise<unknown>;
  setLeverage(leverage: number, symbol?: string): Promise<unknown>;
  setPositionMode(hedged: boolean, symbol?: string): Promise<unknown>;
  createOrder(symbol: string, type: string, side: string, amount: number, price?: number, params?: Record<string, unknown>): Promise<unknown>;
  amountToPrecision(symbol: string, amount: number): string;
};

/**
 * Thin wrapper over ccxt's Binance USD-M futures client. Responses are narrowed field by
 * field so the rest of the app never sees ccxt's loose shapes.
 */
export class CcxtFuturesAdapter {
  private readonly exchange: CcxtFuturesExchange;
  private marketsLoaded = false;
  private hedgeModeSet = false;
  private readonly leverageSet = new Map<string, number>();

  constructor(options: CcxtFuturesAdapterOptions) {
    const exchange: CcxtFuturesExchange = new ccxt.binanceusdm({
      apiKey: options.apiKey,
      secret: options.apiSecret,
      enableRateLimit: true,
      timeout: options.timeoutMs ?? 12_000,
      options: { adjustForTimeDifference: true }
    });
    if (options.env === "TESTNET") {
      exchange.setSandboxMode(true);
    }
    this.exchange = exchange;
  }

  private async ensureMarketsLoaded(): Promise<void> {
    if (this.marketsLoaded) return;
    await this.exchange.loadMarkets();
    this.marketsLoaded = true;
  }

  async fetchCandles(symbol: string, timeframe: string, limit: number): Promise<Candle[]> {
    await this.ensureMarketsLoaded();
    return parseOhlcvRows(await this.exchange.fetchOHLCV(toFuturesSymbol(symbol), timeframe, undefined, limit));
  }

  async fetchTickers(): Promise<TickerSnapshot[]> {
    await this.ensureMarketsLoaded();
    return parseTickers(await this.exchange.fetchTickers());
  }

  async ensureLeverage(symbol: string, leverage: number): Promise<void> {
    if (this.leverageSet.get(symbol) === leverage) return;
    await this.ensureMarketsLoaded();
    await this.exchange.setLeverage(leverage, toFuturesSymbol(symbol));
    this.leverageSet.set(symbol, leverage);
  }

  /** Long and short legs on one symbol need the account in dual-side (hedge) position mode. */
  async ensureHedgeMode(): Promise<void> {
    if (this.hedgeModeSet) return;
    await this.ensureMarketsLoaded();
    try {
      await this.exchange.setPositionMode(true);
    } catch (err) {
      if (!isPositionModeUnchanged(err)) throw err;
    }
    this.hedgeModeSet = true;
  }

  /**
   * In hedge mode Binance refuses the reduceOnly flag; an order that reduces is expressed by
   * trading against its own positionSide, which can never flip the position.
   */
  async createMarketOrder(params: {
    symbol: string;
    side: "BUY" | "SELL";
    positionSide: "LONG" | "SHORT";
    amount: number;
    reduceOnly: boolean;
    clientOrderId?: string;
  }): Promise<MarketOrderFill> {
    await this.ensureHedgeMode();
    const symbol = toFuturesSymbol(params.symbol);
    const amount = Number.parseFloat(this.exchange.amountToPrecision(symbol, params.amount));
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new Error(`Order amount ${params.amount} rounds to zero for ${params.symbol}`);
    }

    const opensLong = params.side === "BUY" && params.positionSide === "LONG";
    const opensShort = params.side === "SELL" && params.positionSide === "SHORT";
    if (params.reduceOnly === (opensLong || opensShort)) {
      throw new Error(`${params.side} on the ${params.positionSide} side does not match reduceOnly=${params.reduceOnly}`);
    }

    const raw = await this.exchange.createOrder(symbol, "market", params.side.toLowerCase(), amount, undefined, {
      positionSide: params.positionSide,
      // Futures only offer ACK (the default) and RESULT; RESULT carries the fill.
      newOrderRespType: "RESULT",
      ...(params.clientOrderId ? { newClientOrderId: params.clientOrderId } : {})
    });
    return parseOrderFill(raw);
  }
}
