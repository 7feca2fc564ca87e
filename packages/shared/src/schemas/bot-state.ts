import { z } from "zod";

export const BOT_STATE_VERSION = 1 as const;

export const BotPhaseSchema = z.enum(["STOPPED", "RUNNING", "STOPPING"]);
export type BotPhase = z.infer<typeof BotPhaseSchema>;

export const DecisionKindSchema = z.enum(["ENGINE", "ENTRY", "HEDGE", "EXIT", "SKIP", "ERROR"]);
export type DecisionKind = z.infer<typeof DecisionKindSchema>;

export const DecisionSchema = z.object({
  id: z.string().min(1),
  ts: z.string().min(1),
  kind: DecisionKindSchema,
  summary: z.string().min(1),
  symbol: z.string().min(1).optional(),
  details: z.record(z.unknown()).optional()
});
export type Decision = z.infer<typeof DecisionSchema>;

export const PositionSideSchema = z.enum(["LONG", "SHORT"]);
export type PositionSide = z.infer<typeof PositionSideSchema>;

export const TradeRoleSchema = z.enum(["ENTRY", "HEDGE"]);
export type TradeRole = z.infer<typeof TradeRoleSchema>;

export const TrendSchema = z.enum(["BULLISH", "BEARISH", "SIDEWAYS"]);
export const VolatilitySchema = z.enum(["HIGH", "MEDIUM", "LOW"]);
export const VolumeProfileSchema = z.enum(["HIGH", "NORMAL", "LOW"]);

export const MarketConditionsSchema = z.object({
  trend: TrendSchema,
  volatility: VolatilitySchema,
  volume: VolumeProfileSchema
});
export type MarketConditions = z.infer<typeof MarketConditionsSchema>;

export const TradeSchema = z
  .object({
    id: z.string().min(1),
    pairId: z.string().min(1),
    symbol: z.string().min(1),
    side: PositionSideSchema,
    role: TradeRoleSchema,
    entryPrice: z.number().positive(),
    exitPrice: z.number().positive().optional(),
    amount: z.number().positive(),
    size: z.number().positive(),
    leverage: z.number().min(1),
    orderId: z.string().min(1),
    exitOrderId: z.string().min(1).optional(),
    openedAt: z.string().min(1),
    closedAt: z.string().min(1).optional(),
    entryReason: z.string().min(1),
    exitReason: z.string().min(1).optional(),
    technicalIndicators: z.record(z.number()).default({}),
    marketConditions: MarketConditionsSchema.optional(),
    realizedPnl: z.number().optional()
  })
  .superRefine((trade, ctx) => {
    if ((trade.exitPrice === undefined) !== (trade.closedAt === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "exitPrice and closedAt must be set together",
        path: ["closedAt"]
      });
    }
  });
export type Trade = z.infer<typeof TradeSchema>;

export const HedgePairStatusSchema = z.enum(["LONG_OPEN", "HEDGED", "CLOSED"]);
export type HedgePairStatus = z.infer<typeof HedgePairStatusSchema>;

export const HedgePairSchema = z
  .object({
    id: z.string().min(1),
    symbol: z.string().min(1),
    longTradeId: z.string().min(1),
    shortTradeId: z.string().min(1).optional(),
    status: HedgePairStatusSchema,
    createdAt: z.string().min(1),
    hedgedAt: z.string().min(1).optional(),
    closedAt: z.string().min(1).optional(),
    closeReason: z.string().min(1).optional(),
    coverageRatio: z.number().nullable().optional()
  })
  .superRefine((pair, ctx) => {
    if (pair.status === "LONG_OPEN" && pair.shortTradeId !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "LONG_OPEN pair cannot carry a short trade", path: ["shortTradeId"] });
    }
    if (pair.status === "HEDGED" && pair.shortTradeId === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "HEDGED pair requires a short trade", path: ["shortTradeId"] });
    }
    if (pair.status === "CLOSED" && pair.closedAt === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "CLOSED pair requires closedAt", path: ["closedAt"] });
    }
  });
export type HedgePair = z.infer<typeof HedgePairSchema>;

export const PortfolioSchema = z.object({
  initialBalance: z.number(),
  balance: z.number(),
  totalPnl: z.number(),
  unrealizedPnl: z.number(),
  totalReturnPct: z.number(),
  openTrades: z.number().int().min(0),
  closedTrades: z.number().int().min(0),
  totalTrades: z.number().int().min(0),
  activePairs: z.number().int().min(0),
  hedgedPairs: z.number().int().min(0),
  winRate: z.number().min(0).max(100)
});
export type Portfolio = z.infer<typeof PortfolioSchema>;

/** Trades closed on one UTC day. */
export const DailySummarySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  trades: z.number().int().min(0),
  totalPnl: z.number(),
  winRate: z.number().min(0).max(100),
  bestTrade: z.number(),
  worstTrade: z.number()
});
export type DailySummary = z.infer<typeof DailySummarySchema>;

export const BotStateSchema = z.object({
  version: z.literal(BOT_STATE_VERSION),
  updatedAt: z.string().min(1),
  running: z.boolean(),
  phase: BotPhaseSchema,
  lastPassAt: z.string().min(1).optional(),
  lastError: z.string().optional(),
  symbols: z.array(z.string().min(1)).default([]),
  trades: z.array(TradeSchema).default([]),
  hedgePairs: z.array(HedgePairSchema).default([]),
  decisions: z.array(DecisionSchema).default([]),
  lastActionCandle: z.record(z.number()).default({}),
  /** UTC day the engine last rolled over; the day before it has been summarized. */
  lastSummaryDate: z.string().optional()
});
export type BotState = z.infer<typeof BotStateSchema>;

export function defaultBotState(): BotState {
  return {
    version: BOT_STATE_VERSION,
    updatedAt: new Date().toISOString(),
    running: false,
    phase: "STOPPED",
    symbols: [],
    trades: [],
    hedgePairs: [],
    decisions: [],
    lastActionCandle: {}
  };
}
