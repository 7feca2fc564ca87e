import { Inject, Injectable } from "@nestjs/common";
import type { DailySummary, Portfolio, TelegramSettings, Trade } from "@hedgebot/shared";

import { errorMessage } from "../bot/trading-errors";
import { ConfigService } from "../config/config.service";
import type { Logger } from "../logging/pino-logger";
import { LOGGER } from "../logging/pino-logger";
import {
  formatDailySummary,
  formatEntry,
  formatError,
  formatExit,
  formatHedgeClosed,
  formatHedgeOpened,
  formatStatus
} from "./message-format";
import { NotificationQueue } from "./notification-queue";
import { TelegramClient } from "./telegram-client";

type Channel = "sendEntries" | "sendExits" | "sendErrors" | "sendStatus" | "sendDailySummary";

/** What the trading pass needs from notifications; every call returns immediately. */
export type Notifier = {
  entry(trade: Trade): void;
  exit(trade: Trade): void;
  hedgeOpened(longTrade: Trade, shortTrade: Trade, longPnlFraction: number): void;
  hedgeClosed(longTrade: Trade, shortTrade: Trade, coverageRatio: number | null): void;
  error(message: string, symbol?: string): void;
};

@Injectable()
export class NotificationsService implements Notifier {
  private queue: NotificationQueue | null = null;
  private client: TelegramClient | null = null;
  private clientKey: string | null = null;

  constructor(
    private readonly configService: ConfigService,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  entry(trade: Trade): void {
    this.publish("sendEntries", () => formatEntry(trade));
  }

  exit(trade: Trade): void {
    this.publish("sendExits", () => formatExit(trade));
  }

  hedgeOpened(longTrade: Trade, shortTrade: Trade, longPnlFraction: number): void {
    this.publish("sendEntries", () => formatHedgeOpened(longTrade, shortTrade, longPnlFraction));
  }

  hedgeClosed(longTrade: Trade, shortTrade: Trade, coverageRatio: number | null): void {
    this.publish("sendExits", () => formatHedgeClosed(longTrade, shortTrade, coverageRatio));
  }

  error(message: string, symbol?: string): void {
    this.publish("sendErrors", () => formatError(message, symbol));
  }

  status(status: string, portfolio: Portfolio): void {
    this.publish("sendStatus", () => formatStatus(status, portfolio));
  }

  dailySummary(summary: DailySummary): void {
    this.publish("sendDailySummary", () => formatDailySummary(summary));
  }

  async flush(): Promise<void> {
    await this.queue?.idle();
  }

  private publish(channel: Channel, render: () => string): void {
    try {
      const settings = this.configService.load().notifications;
      if (!settings.telegram.enabled || !settings.telegram[channel]) return;

      if (!this.queue) {
        this.queue = new NotificationQueue(settings.queueCapacity, (text) => this.deliver(text), this.logger);
      }
      this.queue.enqueue(render());
    } catch (err) {
      this.logger.warn({ channel, err: errorMessage(err) }, "Notification dropped");
    }
  }

  private async deliver(text: string): Promise<void> {
    const telegram = this.configService.load().notifications.telegram;
    const client = this.clientFor(telegram);
    if (!client) {
      this.logger.debug("Telegram disabled, notification discarded");
      return;
    }
    await client.sendMessage(text);
  }

  private clientFor(telegram: TelegramSettings): TelegramClient | null {
    if (!telegram.enabled || !telegram.botToken || !telegram.chatId) return null;
    const key = `${telegram.botToken}|${telegram.chatId}`;
    if (!this.client || this.clientKey !== key) {
      this.client = new TelegramClient({ botToken: telegram.botToken, chatId: telegram.chatId });
      this.clientKey = key;
    }
    return this.client;
  }
}
