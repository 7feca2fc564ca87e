import { z } from "zod";

export const CandleSchema = z.object({
  timestamp: z.number().int(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().min(0)
});
export type Candle = z.infer<typeof CandleSchema>;

export const UniverseSnapshotSchema = z.object({
  refreshedAt: z.string().min(1),
  source: z.enum(["VOLUME", "CONFIGURED"]),
  symbols: z.array(z.string().min(1)),
  errors: z.array(z.object({ symbol: z.string().optional(), error: z.string().min(1) })).default([])
});
export type UniverseSnapshot = z.infer<typeof UniverseSnapshotSchema>;
