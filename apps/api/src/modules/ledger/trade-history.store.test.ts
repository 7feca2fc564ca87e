import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import type { Trade } from "@hedgebot/shared";

import { TradeHistoryStore } from "./trade-history.store";

const trade: Trade = {
  id: "t-1",
  pairId: "p-1",
  symbol: "ETH/USDT",
  side: "LONG",
  role: "ENTRY",
  entryPrice: 2_000,
  amount: 0.025,
  size: 5,
  leverage: 10,
  orderId: "o-1",
  openedAt: "2026-01-01T00:00:00.000Z",
  entryReason: "test entry",
  technicalIndicators: { rsi: 30 }
};

describe("TradeHistoryStore", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function tempFile(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "trade-history-"));
    dirs.push(dir);
    return path.join(dir, "nested", "trades.jsonl");
  }

  it("returns nothing when the file does not exist", () => {
    expect(new TradeHistoryStore(tempFile()).load()).toEqual([]);
  });

  it("folds appended records so the latest per id wins", () => {
    const file = tempFile();
    const store = new TradeHistoryStore(file);

    store.append(trade);
    store.append({ ...trade, id: "t-2", symbol: "BTC/USDT" });
    store.append({ ...trade, exitPrice: 2_100, closedAt: "2026-01-01T01:00:00.000Z", exitReason: "ROI target reached", realizedPnl: 2.5 });
    fs.appendFileSync(file, '{"id":"broken"');

    const loaded = store.load();
    expect(loaded.map((t) => t.id)).toEqual(["t-1", "t-2"]);
    expect(loaded[0].exitPrice).toBe(2_100);
    expect(loaded[0].realizedPnl).toBe(2.5);
    expect(fs.readFileSync(file, "utf-8").split("\n").filter(Boolean)).toHaveLength(4);
  });
});
