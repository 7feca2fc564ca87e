import fs from "node:fs";
import path from "node:path";

import { Inject, Injectable } from "@nestjs/common";
import type { AppConfig, UniverseSettings, UniverseSnapshot } from "@hedgebot/shared";
import { UniverseSnapshotSchema } from "@hedgebot/shared";

import { errorMessage } from "../bot/trading-errors";
import { ConfigService } from "../config/config.service";
import type { TickerSnapshot } from "../integrations/ccxt-futures-adapter";
import { MarketDataService } from "../integrations/market-data.service";
import type { Logger } from "../logging/pino-logger";
import { LOGGER } from "../logging/pino-logger";
import { getPairPolicyBlockReason, splitSymbol } from "../policy/trading-policy";

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

function unique(items: string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const v of items) {
    const u = v.trim().toUpperCase();
    if (!u || seen.has(u)) continue;
    seen.add(u);
    out.push(u);
  }
  return out;
}

/** Top symbols by 24h quote volume that pass the pair policy. */
export function selectByVolume(tickers: TickerSnapshot[], settings: UniverseSettings): string[] {
  const quote = settings.quoteAsset.trim().toUpperCase();
  return tickers
    .filter((t) => splitSymbol(t.symbol)?.quoteAsset === quote)
    .filter((t) => (t.quoteVolume ?? 0) >= settings.min24hVolume)
    .filter(
      (t) =>
        getPairPolicyBlockReason({
          symbol: t.symbol,
          neverTradeSymbols: settings.neverTradeSymbols,
          excludeStableStablePairs: settings.excludeStableStablePairs
        }) === null
    )
    .sort((a, b) => (b.quoteVolume ?? 0) - (a.quoteVolume ?? 0))
    .slice(0, settings.maxSymbols)
    .map((t) => t.symbol.toUpperCase());
}

export function configuredSymbols(config: AppConfig): string[] {
  return unique(config.trading.symbols).filter(
    (symbol) =>
      getPairPolicyBlockReason({
        symbol,
        neverTradeSymbols: config.universe.neverTradeSymbols,
        excludeStableStablePairs: config.universe.excludeStableStablePairs
      }) === null
  );
}

@Injectable()
export class UniverseService {
  private cached: UniverseSnapshot | null = null;
  private refreshInFlight: Promise<UniverseSnapshot> | null = null;

  private readonly dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  private readonly snapshotPath = path.join(this.dataDir, "universe.json");

  constructor(
    private readonly configService: ConfigService,
    private readonly marketData: MarketDataService,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  getLatest(): UniverseSnapshot | null {
    if (this.cached) return this.cached;
    if (!fs.existsSync(this.snapshotPath)) return null;

    try {
      this.cached = UniverseSnapshotSchema.parse(JSON.parse(fs.readFileSync(this.snapshotPath, "utf-8")));
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, "Ignoring unreadable universe.json");
      return null;
    }
    return this.cached;
  }

  /** Symbols for the next pass: the (possibly refreshed) universe plus any symbol still holding a pair. */
  async symbolsForPass(activeSymbols: string[], nowMs = Date.now()): Promise<string[]> {
    const config = this.configService.load();
    const latest = this.getLatest();
    const refreshedAt = latest ? Date.parse(latest.refreshedAt) : Number.NaN;
    const stale = !Number.isFinite(refreshedAt) || nowMs - refreshedAt >= config.universe.refreshIntervalMs;

    const snapshot = stale || !latest ? await this.refresh(nowMs) : latest;
    return unique([...snapshot.symbols, ...activeSymbols]);
  }

  async refresh(nowMs = Date.now()): Promise<UniverseSnapshot> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.refreshNow(nowMs).finally(() => {
        this.refreshInFlight = null;
      });
    }
    return await this.refreshInFlight;
  }

  private async refreshNow(nowMs: number): Promise<UniverseSnapshot> {
    const config = this.configService.load();
    const refreshedAt = new Date(nowMs).toISOString();
    const fallback = configuredSymbols(config);

    let snapshot: UniverseSnapshot;
    if (!config.universe.filterByVolume) {
      snapshot = { refreshedAt, source: "CONFIGURED", symbols: fallback, errors: [] };
    } else {
      try {
        const symbols = selectByVolume(await this.marketData.getTickers(), config.universe);
        snapshot =
          symbols.length > 0
            ? { refreshedAt, source: "VOLUME", symbols, errors: [] }
            : { refreshedAt, source: "CONFIGURED", symbols: fallback, errors: [{ error: "No symbols passed the volume filter" }] };
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, "Universe refresh failed, using configured symbols");
        snapshot = { refreshedAt, source: "CONFIGURED", symbols: fallback, errors: [{ error: errorMessage(err) }] };
      }
    }

    this.cached = snapshot;
    this.persist(snapshot);
    this.logger.info({ source: snapshot.source, count: snapshot.symbols.length }, "Universe refreshed");
    return snapshot;
  }

  private persist(snapshot: UniverseSnapshot): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.snapshotPath, JSON.stringify(snapshot, null, 2));
  }
}
