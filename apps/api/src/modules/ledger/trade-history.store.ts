import fs from "node:fs";
import path from "node:path";

import type { Trade } from "@hedgebot/shared";
import { TradeSchema } from "@hedgebot/shared";

/**
 * Append-only trade history. Each line is a full trade record; the last line per id wins
 * when the file is folded back into trades.
 */
export class TradeHistoryStore {
  constructor(private readonly filePath: string) {}

  append(trade: Trade): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, `${JSON.stringify(trade)}\n`, { encoding: "utf-8" });
  }

  load(): Trade[] {
    if (!fs.existsSync(this.filePath)) return [];

    const byId = new Map<string, Trade>();
    const raw = fs.readFileSync(this.filePath, "utf-8");
    for (const line of raw.split("\n")) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      try {
        const parsed = TradeSchema.safeParse(JSON.parse(trimmed));
        if (parsed.success) byId.set(parsed.data.id, parsed.data);
      } catch {
        // torn trailing line after a crash
      }
    }
    return [...byId.values()];
  }
}
