import { z } from "zod";

export const CONFIG_VERSION = 1 as const;

export const ExchangeEnvironmentSchema = z.enum(["PAPER", "TESTNET", "MAINNET"]);
export type ExchangeEnvironment = z.infer<typeof ExchangeEnvironmentSchema>;

export const TimeframeSchema = z.enum(["1m", "3m", "5m", "15m", "30m", "1h", "4h", "1d"]);
export type Timeframe = z.infer<typeof TimeframeSchema>;

export type RoiTableRow = {
  minutes: number;
  minProfit: number;
};

export const DEFAULT_MINIMAL_ROI: Record<string, number> = {
  "0": 0.7,
  "1": 0.65,
  "2": 0.6,
  "5": 0.45,
  "10": 0.2,
  "15": 0.15,
  "30": 0.07,
  "60": 0.03,
  "120": 0
};

/**
 * Accepts either the `{ "minutes": fraction }` object form or an array of rows and
 * normalizes to rows sorted by minutes. Required profit may only fall as time passes.
 */
export const RoiTableSchema = z
  .union([
    z.record(z.number().min(-1).max(100)),
    z.array(z.object({ minutes: z.number().min(0), minProfit: z.number().min(-1).max(100) }))
  ])
  .transform((value, ctx): RoiTableRow[] => {
    const rows: RoiTableRow[] = Array.isArray(value)
      ? value.map((r) => ({ minutes: r.minutes, minProfit: r.minProfit }))
      : Object.entries(value).map(([key, minProfit]) => ({ minutes: Number.parseFloat(key), minProfit }));

    for (const row of rows) {
      if (!Number.isFinite(row.minutes) || row.minutes < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid ROI minutes key: ${row.minutes}` });
        return z.NEVER;
      }
    }

    rows.sort((a, b) => a.minutes - b.minutes);
    for (let i = 1; i < rows.length; i += 1) {
      if (rows[i].minutes === rows[i - 1].minutes) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate ROI threshold at ${rows[i].minutes} minutes` });
        return z.NEVER;
      }
      if (rows[i].minProfit > rows[i - 1].minProfit) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `ROI profit at ${rows[i].minutes} minutes exceeds the ${rows[i - 1].minutes}-minute row`
        });
        return z.NEVER;
      }
    }
    if (rows.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "ROI table needs at least one row" });
      return z.NEVER;
    }
    return rows;
  });

export const ExchangeSettingsSchema = z.object({
  environment: ExchangeEnvironmentSchema.default("PAPER"),
  apiKey: z.string().min(1).optional(),
  apiSecret: z.string().min(1).optional()
});
export type ExchangeSettings = z.infer<typeof ExchangeSettingsSchema>;

export const TradingSettingsSchema = z.object({
  timeframe: TimeframeSchema.default("5m"),
  candleLimit: z.number().int().min(50).max(1500).default(250),
  pollIntervalMs: z.number().int().min(1_000).max(86_400_000).default(300_000),
  orderTimeoutMs: z.number().int().min(500).max(120_000).default(15_000),
  initialBalance: z.number().positive().default(100),
  leverage: z.number().min(1).max(125).default(10),
  maxOpenPairs: z.number().int().min(1).max(100).default(5),
  longPositionSize: z.number().positive().default(5),
  shortPositionSize: z.number().positive().default(10),
  stopLoss: z.number().max(0).min(-10).nullable().default(null),
  exitOnSignal: z.boolean().default(true),
  symbols: z.array(z.string().min(1)).default(["BTC/USDT", "ETH/USDT", "BNB/USDT", "SOL/USDT", "XRP/USDT"])
});
export type TradingSettings = z.infer<typeof TradingSettingsSchema>;

export const StrategySettingsSchema = z.object({
  baseNbCandlesBuy: z.number().int().min(2).max(200).default(17),
  baseNbCandlesSell: z.number().int().min(2).max(200).default(49),
  lowOffset: z.number().min(0.5).max(1.5).default(0.978),
  highOffset: z.number().min(0.5).max(1.5).default(1.019),
  ewoLow: z.number().default(-17.457),
  ewoHigh: z.number().default(3.34),
  rsiBuy: z.number().min(0).max(100).default(65),
  fastEwo: z.number().int().min(2).max(500).default(50),
  slowEwo: z.number().int().min(2).max(1000).default(200)
});
export type StrategySettings = z.infer<typeof StrategySettingsSchema>;

export const HedgeSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  triggerLoss: z.number().lt(0).min(-10).default(-0.5),
  minCoverageRatio: z.number().min(0).default(1)
});
export type HedgeSettings = z.infer<typeof HedgeSettingsSchema>;

export const UniverseSettingsSchema = z.object({
  filterByVolume: z.boolean().default(true),
  quoteAsset: z.string().min(2).default("USDT"),
  maxSymbols: z.number().int().min(1).max(500).default(20),
  min24hVolume: z.number().min(0).default(1_000_000),
  refreshIntervalMs: z.number().int().min(60_000).default(3_600_000),
  neverTradeSymbols: z.array(z.string().min(1)).default([]),
  excludeStableStablePairs: z.boolean().default(true)
});
export type UniverseSettings = z.infer<typeof UniverseSettingsSchema>;

export const TelegramSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  botToken: z.string().min(1).optional(),
  chatId: z.string().min(1).optional(),
  sendEntries: z.boolean().default(true),
  sendExits: z.boolean().default(true),
  sendErrors: z.boolean().default(true),
  sendStatus: z.boolean().default(true),
  sendDailySummary: z.boolean().default(true)
});
export type TelegramSettings = z.infer<typeof TelegramSettingsSchema>;

export const NotificationSettingsSchema = z.object({
  queueCapacity: z.number().int().min(1).max(10_000).default(100),
  telegram: TelegramSettingsSchema.default({})
});
export type NotificationSettings = z.infer<typeof NotificationSettingsSchema>;

export const ApiSettingsSchema = z.object({
  apiKey: z.string().min(16).optional(),
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(1).max(65535).default(8148)
});
export type ApiSettings = z.infer<typeof ApiSettingsSchema>;

export const AppConfigSchema = z
  .object({
    version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
    exchange: ExchangeSettingsSchema.default({}),
    trading: TradingSettingsSchema.default({}),
    strategy: StrategySettingsSchema.default({}),
    hedge: HedgeSettingsSchema.default({}),
    minimalRoi: RoiTableSchema.default(DEFAULT_MINIMAL_ROI),
    universe: UniverseSettingsSchema.default({}),
    notifications: NotificationSettingsSchema.default({}),
    api: ApiSettingsSchema.default({})
  })
  .superRefine((value, ctx) => {
    if (value.exchange.environment !== "PAPER" && (!value.exchange.apiKey || !value.exchange.apiSecret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "exchange.apiKey and exchange.apiSecret are required unless environment=PAPER",
        path: ["exchange", "apiKey"]
      });
    }
    if (value.notifications.telegram.enabled && (!value.notifications.telegram.botToken || !value.notifications.telegram.chatId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "telegram.botToken and telegram.chatId are required when telegram.enabled=true",
        path: ["notifications", "telegram", "botToken"]
      });
    }
    if (value.strategy.fastEwo >= value.strategy.slowEwo) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "strategy.fastEwo must be shorter than strategy.slowEwo",
        path: ["strategy", "fastEwo"]
      });
    }
  });

export type AppConfig = z.output<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

export function defaultAppConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Number of candles the strategy needs before every indicator has a value on the last bar.
 */
export function requiredCandles(strategy: StrategySettings): number {
  return Math.max(strategy.slowEwo, strategy.baseNbCandlesBuy, strategy.baseNbCandlesSell, 15) + 1;
}
