import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { BadRequestException, Injectable } from "@nestjs/common";
import type { AppConfig } from "@hedgebot/shared";
import { AppConfigSchema } from "@hedgebot/shared";
import type { ZodError } from "zod";

type JsonObject = Record<string, unknown>;

function atomicWriteFile(filePath: string, data: string): void {
  const tmpPath = `${filePath}.tmp`;
  fs.writeFileSync(tmpPath, data, { encoding: "utf-8" });
  fs.renameSync(tmpPath, filePath);
}

function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; arrays and scalars in the patch replace. */
export function deepMerge(base: JsonObject, patch: JsonObject): JsonObject {
  const out: JsonObject = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return out;
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function envOverrides(env: NodeJS.ProcessEnv): JsonObject {
  const exchange: JsonObject = {};
  if (env.EXCHANGE_API_KEY) exchange.apiKey = env.EXCHANGE_API_KEY;
  if (env.EXCHANGE_API_SECRET) exchange.apiSecret = env.EXCHANGE_API_SECRET;

  const telegram: JsonObject = {};
  if (env.TELEGRAM_BOT_TOKEN) telegram.botToken = env.TELEGRAM_BOT_TOKEN;
  if (env.TELEGRAM_CHAT_ID) telegram.chatId = env.TELEGRAM_CHAT_ID;

  const api: JsonObject = {};
  const port = Number.parseInt(env.PORT ?? "", 10);
  if (Number.isFinite(port)) api.port = port;

  return { exchange, notifications: { telegram }, api };
}

export type RedactedConfig = Omit<AppConfig, "exchange" | "notifications" | "api"> & {
  exchange: Omit<AppConfig["exchange"], "apiKey" | "apiSecret"> & { credentialsConfigured: boolean };
  notifications: Omit<AppConfig["notifications"], "telegram"> & {
    telegram: Omit<AppConfig["notifications"]["telegram"], "botToken"> & { botTokenConfigured: boolean };
  };
  api: Omit<AppConfig["api"], "apiKey"> & { apiKeyHint: string | null };
};

@Injectable()
export class ConfigService {
  private cachedConfig: AppConfig | null = null;
  private cachedMtimeMs: number | null = null;

  private get dataDir(): string {
    return process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  migrateOnStartup(): { migrated: boolean; reason: "created" | "up_to_date" | "normalized" | "invalid_file" } {
    if (!fs.existsSync(this.configPath)) {
      const created = AppConfigSchema.parse({ api: { apiKey: crypto.randomBytes(32).toString("hex") } });
      this.writeFile(created);
      return { migrated: true, reason: "created" };
    }

    const raw = this.readRaw();
    const withKey = isPlainObject(raw.api) && typeof raw.api.apiKey === "string"
      ? raw
      : deepMerge(raw, { api: { apiKey: crypto.randomBytes(32).toString("hex") } });

    const parsed = AppConfigSchema.safeParse(withKey);
    if (!parsed.success) {
      // Secrets may arrive only through the environment; leave the file as written.
      if (withKey !== raw) this.writeFile(withKey);
      return { migrated: withKey !== raw, reason: "invalid_file" };
    }

    const current = fs.readFileSync(this.configPath, "utf-8");
    if (current.trim() === JSON.stringify(parsed.data, null, 2).trim()) {
      return { migrated: false, reason: "up_to_date" };
    }
    this.writeFile(parsed.data);
    return { migrated: true, reason: "normalized" };
  }

  /** File values, then environment overrides, then schema defaults. */
  load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return this.parse({});
    }

    const stat = fs.statSync(this.configPath);
    if (this.cachedConfig && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cachedConfig;
    }

    const parsed = this.parse(this.readRaw());
    this.cachedConfig = parsed;
    this.cachedMtimeMs = stat.mtimeMs;
    return parsed;
  }

  update(patch: JsonObject): AppConfig {
    const merged = deepMerge(this.readRaw(), patch);
    const result = AppConfigSchema.safeParse(deepMerge(merged, envOverrides(process.env)));
    if (!result.success) {
      throw new BadRequestException({ message: "Invalid configuration", issues: formatZodIssues(result.error) });
    }

    this.writeFile(merged);
    this.cachedConfig = result.data;
    this.cachedMtimeMs = fs.statSync(this.configPath).mtimeMs;
    return result.data;
  }

  redact(config: AppConfig): RedactedConfig {
    const { apiKey: exchangeKey, apiSecret, ...exchange } = config.exchange;
    const { botToken, ...telegram } = config.notifications.telegram;
    const { apiKey, ...api } = config.api;
    return {
      ...config,
      exchange: { ...exchange, credentialsConfigured: Boolean(exchangeKey && apiSecret) },
      notifications: { ...config.notifications, telegram: { ...telegram, botTokenConfigured: Boolean(botToken) } },
      api: { ...api, apiKeyHint: apiKey ? apiKey.slice(-6) : null }
    };
  }

  private parse(raw: JsonObject): AppConfig {
    const result = AppConfigSchema.safeParse(deepMerge(raw, envOverrides(process.env)));
    if (!result.success) {
      throw new Error(`Invalid config.json: ${formatZodIssues(result.error).join("; ")}`);
    }
    return result.data;
  }

  private readRaw(): JsonObject {
    if (!fs.existsSync(this.configPath)) return {};
    const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, "utf-8"));
    if (!isPlainObject(parsed)) {
      throw new Error("config.json must contain a JSON object");
    }
    return parsed;
  }

  private writeFile(value: unknown): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.configPath, JSON.stringify(value, null, 2));
    this.cachedConfig = null;
    this.cachedMtimeMs = null;
  }
}
