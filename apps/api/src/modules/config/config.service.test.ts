import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { BadRequestException } from "@nestjs/common";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigService, deepMerge } from "./config.service";

describe("ConfigService", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "hedgebot-config-"));
    vi.stubEnv("DATA_DIR", dataDir);
    for (const name of ["EXCHANGE_API_KEY", "EXCHANGE_API_SECRET", "TELEGRAM_BOT_TOKEN", "TELEGRAM_CHAT_ID", "PORT"]) {
      vi.stubEnv(name, "");
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  function readFile(): Record<string, unknown> {
    return JSON.parse(fs.readFileSync(path.join(dataDir, "config.json"), "utf-8")) as Record<string, unknown>;
  }

  it("writes defaults with a generated api key on first start", () => {
    const service = new ConfigService();

    expect(service.migrateOnStartup()).toEqual({ migrated: true, reason: "created" });
    const config = service.load();
    expect(config.exchange.environment).toBe("PAPER");
    expect(config.api.apiKey).toMatch(/^[0-9a-f]{64}$/);

    expect(service.migrateOnStartup()).toEqual({ migrated: false, reason: "up_to_date" });
  });

  it("serves defaults when no file exists", () => {
    expect(new ConfigService().load().trading.leverage).toBe(10);
  });

  it("layers secrets from the environment over the file", () => {
    fs.writeFileSync(path.join(dataDir, "config.json"), JSON.stringify({ exchange: { environment: "TESTNET" } }));
    vi.stubEnv("EXCHANGE_API_KEY", "test-key");
    vi.stubEnv("EXCHANGE_API_SECRET", "test-secret");

    const service = new ConfigService();
    expect(service.migrateOnStartup().reason).toBe("invalid_file");

    const config = service.load();
    expect(config.exchange.environment).toBe("TESTNET");
    expect(config.exchange.apiSecret).toBe("test-secret");
    expect(readFile()).not.toHaveProperty("exchange.apiSecret");
  });

  it("deep-merges patches and rejects invalid ones", () => {
    const service = new ConfigService();
    service.migrateOnStartup();

    const updated = service.update({ hedge: { triggerLoss: -0.3 }, trading: { symbols: ["ETH/USDT"] } });
    expect(updated.hedge.triggerLoss).toBe(-0.3);
    expect(updated.hedge.enabled).toBe(true);
    expect(updated.trading.symbols).toEqual(["ETH/USDT"]);
    expect(service.load().hedge.triggerLoss).toBe(-0.3);

    expect(() => service.update({ hedge: { triggerLoss: 0.5 } })).toThrow(BadRequestException);
    expect(service.load().hedge.triggerLoss).toBe(-0.3);
  });

  it("redacts secrets for display", () => {
    const service = new ConfigService();
    service.migrateOnStartup();
    const config = service.load();

    const redacted = service.redact(config);
    expect(redacted.api.apiKeyHint).toBe(config.api.apiKey?.slice(-6));
    expect(redacted.exchange.credentialsConfigured).toBe(false);
    expect(redacted).not.toHaveProperty("api.apiKey");
  });
});

describe("deepMerge", () => {
  it("merges nested objects and replaces arrays", () => {
    expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, e: 2 })).toEqual({ a: { b: 1, c: [3] }, d: 1, e: 2 });
  });
});
