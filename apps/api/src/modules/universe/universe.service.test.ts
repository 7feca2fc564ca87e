import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { AppConfig } from "@hedgebot/shared";
import { AppConfigSchema } from "@hedgebot/shared";

import { DataUnavailableError } from "../bot/trading-errors";
import type { ConfigService } from "../config/config.service";
import type { MarketDataService } from "../integrations/market-data.service";
import { silentLogger } from "../logging/pino-logger";
import { UniverseService, configuredSymbols, selectByVolume } from "./universe.service";

const tickers = [
  { symbol: "BTC/USDT", last: 50_000, quoteVolume: 9_000_000 },
  { symbol: "ETH/USDT", last: 3_000, quoteVolume: 5_000_000 },
  { symbol: "USDC/USDT", last: 1, quoteVolume: 8_000_000 },
  { symbol: "DOGE/USDT", last: 0.1, quoteVolume: 7_000_000 },
  { symbol: "SOL/USDT", last: 100, quoteVolume: 500_000 },
  { symbol: "XRP/BUSD", last: 0.5, quoteVolume: 9_500_000 }
];

function config(input: Record<string, unknown>): AppConfig {
  return AppConfigSchema.parse(input);
}

describe("selectByVolume", () => {
  it("keeps the quote asset, drops policy-blocked and thin markets, sorts by volume", () => {
    const settings = config({ universe: { neverTradeSymbols: ["DOGE"], min24hVolume: 1_000_000, maxSymbols: 5 } }).universe;

    expect(selectByVolume(tickers, settings)).toEqual(["BTC/USDT", "ETH/USDT"]);
    expect(selectByVolume(tickers, { ...settings, maxSymbols: 1 })).toEqual(["BTC/USDT"]);
  });

  it("filters the configured fallback through the same policy", () => {
    expect(configuredSymbols(config({ trading: { symbols: ["btc/usdt", "BTC/USDT", "USDC/USDT"] } }))).toEqual(["BTC/USDT"]);
  });
});

describe("UniverseService", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "hedgebot-universe-"));
    vi.stubEnv("DATA_DIR", dataDir);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  function build(appConfig: AppConfig, getTickers: MarketDataService["getTickers"]): UniverseService {
    return new UniverseService(
      { load: () => appConfig } as unknown as ConfigService,
      { getTickers } as unknown as MarketDataService,
      silentLogger()
    );
  }

  it("falls back to configured symbols when tickers are unavailable and keeps active pairs", async () => {
    const appConfig = config({ trading: { symbols: ["ETH/USDT"] } });
    const service = build(appConfig, vi.fn().mockRejectedValue(new DataUnavailableError("*", "Ticker fetch failed: down")));

    const symbols = await service.symbolsForPass(["ADA/USDT"], Date.parse("2026-01-01T00:00:00.000Z"));

    expect(symbols).toEqual(["ETH/USDT", "ADA/USDT"]);
    expect(service.getLatest()).toEqual({
      refreshedAt: "2026-01-01T00:00:00.000Z",
      source: "CONFIGURED",
      symbols: ["ETH/USDT"],
      errors: [{ error: "Ticker fetch failed: down" }]
    });
    expect(fs.existsSync(path.join(dataDir, "universe.json"))).toBe(true);
  });

  it("reuses the snapshot until the refresh interval passes", async () => {
    const appConfig = config({ universe: { min24hVolume: 1_000_000, refreshIntervalMs: 3_600_000 } });
    const getTickers = vi.fn().mockResolvedValue(tickers);
    const service = build(appConfig, getTickers);
    const start = Date.parse("2026-01-01T00:00:00.000Z");

    expect(await service.symbolsForPass([], start)).toEqual(["BTC/USDT", "DOGE/USDT", "ETH/USDT"]);
    await service.symbolsForPass([], start + 60_000);
    expect(getTickers).toHaveBeenCalledTimes(1);

    await service.symbolsForPass([], start + 3_600_000);
    expect(getTickers).toHaveBeenCalledTimes(2);
  });
});
