import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { Inject, Injectable } from "@nestjs/common";
import type { OnApplicationShutdown, OnModuleInit } from "@nestjs/common";
import type { AppConfig, BotState, Decision, Portfolio } from "@hedgebot/shared";
import { BotStateSchema, defaultBotState } from "@hedgebot/shared";

import { ConfigService } from "../config/config.service";
import { MarketDataService } from "../integrations/market-data.service";
import { TradingService } from "../integrations/trading.service";
import { TradeHistoryStore } from "../ledger/trade-history.store";
import { TradeLedger } from "../ledger/trade-ledger";
import type { Logger } from "../logging/pino-logger";
import { LOGGER } from "../logging/pino-logger";
import { NotificationsService } from "../notifications/notifications.service";
import { UniverseService } from "../universe/universe.service";
import { errorMessage } from "./trading-errors";
import type { TradingContext, TradingPassDeps } from "./trading-pass";
import { KILL_SWITCH_REASON, closeAllPositions, runTradingPass } from "./trading-pass";

const MAX_DECISIONS = 500;

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

export type KillResult = {
  closedPairs: number;
  errors: number;
};

@Injectable()
export class BotEngineService implements OnModuleInit, OnApplicationShutdown {
  private readonly dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  private readonly statePath = path.join(this.dataDir, "state.json");
  private readonly history = new TradeHistoryStore(path.join(this.dataDir, "trades.jsonl"));

  private state: BotState | null = null;
  private loopTimer: NodeJS.Timeout | null = null;
  private passInFlight: Promise<void> | null = null;
  private killInFlight: Promise<KillResult> | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly marketData: MarketDataService,
    private readonly trading: TradingService,
    private readonly universe: UniverseService,
    private readonly notifications: NotificationsService,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  onModuleInit(): void {
    const state = this.getState();
    if (!state.running) return;

    this.logger.info({ pairs: state.hedgePairs.filter((p) => p.status !== "CLOSED").length }, "Resuming trading loop from state.json");
    this.commit({ ...state, phase: "RUNNING" }, [this.decision("ENGINE", "Resumed after restart")]);
    this.scheduleNext(0);
  }

  async onApplicationShutdown(): Promise<void> {
    // `running` stays persisted so the loop resumes on the next boot.
    this.clearTimer();
    await this.passInFlight;
    await this.notifications.flush();
  }

  getState(): BotState {
    this.state ??= this.loadState();
    return this.state;
  }

  isPassInFlight(): boolean {
    return this.passInFlight !== null;
  }

  start(): BotState {
    const state = this.getState();
    if (this.killInFlight) {
      this.logger.warn("Start ignored while the kill switch is closing positions");
      return state;
    }
    if (state.running) return state;

    this.commit({ ...state, running: true, phase: "RUNNING", lastError: undefined }, [this.decision("ENGINE", "Start requested")]);
    this.logger.info("Trading loop started");
    this.notifications.status("Started", this.portfolio());
    this.scheduleNext(0);
    return this.getState();
  }

  /** Stops scheduling and waits for the pass in flight; positions stay open. */
  async stop(): Promise<BotState> {
    const state = this.getState();
    if (!state.running) return state;

    this.clearTimer();
    this.commit({ ...state, phase: "STOPPING" }, [this.decision("ENGINE", "Stop requested")]);
    await this.passInFlight;

    this.commit({ ...this.getState(), running: false, phase: "STOPPED" }, []);
    this.logger.info("Trading loop stopped");
    this.notifications.status("Stopped", this.portfolio());
    return this.getState();
  }

  /**
   * Stop, then close every open leg with reduce-only orders. Concurrent calls share one run,
   * and the closing work holds the pass slot so no trading pass overlaps it.
   */
  async kill(now = new Date()): Promise<KillResult> {
    this.killInFlight ??= this.executeKill(now).finally(() => {
      this.killInFlight = null;
    });
    return await this.killInFlight;
  }

  /** Runs one pass unless one is already in flight. */
  async tick(now = new Date()): Promise<void> {
    if (this.passInFlight) return;
    this.passInFlight = this.executePass(now).finally(() => {
      this.passInFlight = null;
    });
    await this.passInFlight;
  }

  portfolio(): Portfolio {
    const state = this.getState();
    const ledger = new TradeLedger(this.configService.load().trading.initialBalance, state.trades);
    return ledger.snapshot({ priceOf: (symbol) => this.marketData.lastPrice(symbol), hedgePairs: state.hedgePairs });
  }

  private async executeKill(now: Date): Promise<KillResult> {
    await this.stop();
    await this.passInFlight;

    let result: KillResult = { closedPairs: 0, errors: 0 };
    this.passInFlight = this.closeEverything(now)
      .then((closed) => {
        result = closed;
      })
      .finally(() => {
        this.passInFlight = null;
      });
    await this.passInFlight;
    return result;
  }

  private async closeEverything(now: Date): Promise<KillResult> {
    const state = this.getState();
    const ctx = this.buildContext(this.configService.load(), [], state);
    const activeBefore = ctx.hedgePairs.filter((p) => p.status !== "CLOSED").length;
    const outcome = await closeAllPositions(ctx, this.passDeps(), KILL_SWITCH_REASON, now);
    const closedPairs = activeBefore - ctx.hedgePairs.filter((p) => p.status !== "CLOSED").length;

    const summary = `Kill switch: ${closedPairs} pair(s) closed, ${outcome.errors} error(s)`;
    this.commit(
      {
        ...this.getState(),
        ...this.fromContext(ctx),
        lastError: outcome.errors > 0 ? summary : undefined
      },
      [...outcome.decisions, this.decision("ENGINE", summary)]
    );
    this.logger.warn({ closedPairs, errors: outcome.errors }, "Kill switch executed");
    this.notifications.status(summary, this.portfolio());
    return { closedPairs, errors: outcome.errors };
  }

  private async executePass(now: Date): Promise<void> {
    const state = this.getState();
    if (!state.running || state.phase !== "RUNNING") return;

    try {
      const config = this.configService.load();
      const active = state.hedgePairs.filter((p) => p.status !== "CLOSED").map((p) => p.symbol);
      const symbols = await this.universe.symbolsForPass(active, now.getTime());

      const ctx = this.buildContext(config, symbols, state);
      const outcome = await runTradingPass(ctx, this.passDeps(), now);
      const lastErrorDecision = outcome.decisions.filter((d) => d.kind === "ERROR").at(-1);
      const today = now.toISOString().slice(0, 10);
      const previousDay = state.lastSummaryDate;

      this.commit(
        {
          ...this.getState(),
          ...this.fromContext(ctx),
          symbols,
          lastPassAt: now.toISOString(),
          lastError: lastErrorDecision?.summary,
          lastSummaryDate: today
        },
        outcome.decisions
      );
      if (previousDay && previousDay !== today) {
        const summary = ctx.ledger.dailySummary(previousDay);
        this.logger.info(summary, "Daily summary");
        this.notifications.dailySummary(summary);
      }
      this.logger.debug({ symbols: symbols.length, decisions: outcome.decisions.length, errors: outcome.errors }, "Pass finished");
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error({ err: message }, "Trading pass failed");
      this.commit({ ...this.getState(), lastPassAt: now.toISOString(), lastError: message }, [
        this.decision("ERROR", `Pass failed: ${message}`)
      ]);
    }
  }

  private scheduleNext(delayMs: number): void {
    this.clearTimer();
    this.loopTimer = setTimeout(() => {
      this.loopTimer = null;
      void this.loopOnce();
    }, delayMs);
  }

  // The next pass is only scheduled after the previous one settled, so passes never overlap.
  private async loopOnce(): Promise<void> {
    await this.tick();
    const state = this.getState();
    if (state.running && state.phase === "RUNNING") {
      this.scheduleNext(this.configService.load().trading.pollIntervalMs);
    }
  }

  private clearTimer(): void {
    if (this.loopTimer) clearTimeout(this.loopTimer);
    this.loopTimer = null;
  }

  private passDeps(): TradingPassDeps {
    return {
      getCandles: (symbol, timeframe, limit) => this.marketData.getCandles(symbol, timeframe, limit),
      orders: this.trading,
      notifier: this.notifications,
      logger: this.logger,
      history: this.history
    };
  }

  private buildContext(config: AppConfig, symbols: string[], state: BotState): TradingContext {
    return {
      config,
      symbols,
      ledger: new TradeLedger(config.trading.initialBalance, state.trades),
      hedgePairs: [...state.hedgePairs],
      lastActionCandle: { ...state.lastActionCandle }
    };
  }

  private fromContext(ctx: TradingContext): Pick<BotState, "trades" | "hedgePairs" | "lastActionCandle"> {
    return { trades: ctx.ledger.all(), hedgePairs: ctx.hedgePairs, lastActionCandle: ctx.lastActionCandle };
  }

  private decision(kind: Decision["kind"], summary: string): Decision {
    return { id: crypto.randomUUID(), ts: new Date().toISOString(), kind, summary };
  }

  /** `decisions` arrive oldest first and are stored newest first. */
  private commit(next: BotState, decisions: Decision[]): void {
    const merged: BotState = {
      ...next,
      updatedAt: new Date().toISOString(),
      decisions: [...[...decisions].reverse(), ...next.decisions].slice(0, MAX_DECISIONS)
    };
    this.state = merged;
    this.save(merged);
  }

  private save(state: BotState): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.statePath, JSON.stringify(state, null, 2));
  }

  private loadState(): BotState {
    if (!fs.existsSync(this.statePath)) {
      const closed = this.history.load().filter((t) => t.closedAt !== undefined);
      if (closed.length > 0) {
        this.logger.warn({ trades: closed.length }, "state.json missing, restoring closed trades from trades.jsonl");
      }
      return { ...defaultBotState(), trades: closed };
    }

    try {
      return BotStateSchema.parse(JSON.parse(fs.readFileSync(this.statePath, "utf-8")));
    } catch (err) {
      const backupPath = `${this.statePath}.invalid-${Date.now()}`;
      fs.copyFileSync(this.statePath, backupPath);
      this.logger.error({ err: errorMessage(err), backupPath }, "state.json is invalid, starting from an empty state");
      return { ...defaultBotState(), lastError: `Failed to load state.json: ${errorMessage(err)}` };
    }
  }
}
