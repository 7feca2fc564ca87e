import { Injectable } from "@nestjs/common";
import type { HedgePair, HedgePairStatus, Portfolio, Trade } from "@hedgebot/shared";

import { BotEngineService } from "../bot/bot-engine.service";

export type TradeFilter = "open" | "closed" | "all";

function newestFirst<T extends { createdAt?: string; openedAt?: string }>(items: T[]): T[] {
  const ts = (item: T) => Date.parse(item.openedAt ?? item.createdAt ?? "");
  return [...items].sort((a, b) => {
    const ta = ts(a);
    const tb = ts(b);
    if (!Number.isFinite(ta) && !Number.isFinite(tb)) return 0;
    if (!Number.isFinite(ta)) return 1;
    if (!Number.isFinite(tb)) return -1;
    return tb - ta;
  });
}

@Injectable()
export class PortfolioService {
  constructor(private readonly botEngine: BotEngineService) {}

  getPortfolio(): Portfolio {
    return this.botEngine.portfolio();
  }

  getTrades(filter: TradeFilter = "all", symbol?: string): Trade[] {
    const wanted = symbol?.trim().toUpperCase();
    return newestFirst(this.botEngine.getState().trades).filter((t) => {
      if (wanted && t.symbol !== wanted) return false;
      if (filter === "open") return t.closedAt === undefined;
      if (filter === "closed") return t.closedAt !== undefined;
      return true;
    });
  }

  getHedgePairs(status?: HedgePairStatus): HedgePair[] {
    const pairs = newestFirst(this.botEngine.getState().hedgePairs);
    return status ? pairs.filter((p) => p.status === status) : pairs;
  }
}
