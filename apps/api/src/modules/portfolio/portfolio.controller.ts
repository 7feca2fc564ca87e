import { BadRequestException, Controller, Get, Query } from "@nestjs/common";
import type { HedgePair, Portfolio, Trade } from "@hedgebot/shared";
import { HedgePairStatusSchema } from "@hedgebot/shared";
import { z } from "zod";

import { formatZodIssues } from "../config/config.service";
import { PortfolioService } from "./portfolio.service";

const TradeQuerySchema = z.object({
  status: z.enum(["open", "closed", "all"]).default("all"),
  symbol: z.string().min(1).optional()
});

const PairQuerySchema = z.object({
  status: HedgePairStatusSchema.optional()
});

function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.output<T> {
  const parsed = schema.safeParse(query ?? {});
  if (!parsed.success) {
    throw new BadRequestException({ message: "Invalid query", issues: formatZodIssues(parsed.error) });
  }
  return parsed.data;
}

@Controller("portfolio")
export class PortfolioController {
  constructor(private readonly portfolioService: PortfolioService) {}

  @Get()
  getPortfolio(): Portfolio {
    return this.portfolioService.getPortfolio();
  }

  @Get("trades")
  getTrades(@Query() query: Record<string, unknown>): Trade[] {
    const { status, symbol } = parseQuery(TradeQuerySchema, query);
    return this.portfolioService.getTrades(status, symbol);
  }

  @Get("hedge-pairs")
  getHedgePairs(@Query() query: Record<string, unknown>): HedgePair[] {
    const { status } = parseQuery(PairQuerySchema, query);
    return this.portfolioService.getHedgePairs(status);
  }
}
