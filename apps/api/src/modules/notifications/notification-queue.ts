import type { Logger } from "../logging/pino-logger";
import { errorMessage } from "../bot/trading-errors";

export type NotificationSender = (message: string) => Promise<void>;

/**
 * Bounded FIFO drained by a single background sender. `enqueue` never waits; when full the
 * oldest message is dropped. Send failures are logged and the drain moves on.
 */
export class NotificationQueue {
  private readonly pending: string[] = [];
  private draining: Promise<void> | null = null;
  private dropped = 0;

  constructor(
    private readonly capacity: number,
    private readonly send: NotificationSender,
    private readonly logger: Logger
  ) {}

  get size(): number {
    return this.pending.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  enqueue(message: string): void {
    if (this.pending.length >= this.capacity) {
      this.pending.shift();
      this.dropped += 1;
      this.logger.warn({ capacity: this.capacity, dropped: this.dropped }, "Notification queue full, dropped oldest message");
    }
    this.pending.push(message);
    this.kick();
  }

  /** Resolves once everything queued so far has been attempted. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private kick(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.pending.length > 0) this.kick();
    });
  }

  private async drain(): Promise<void> {
    // Yield first so the caller's pass continues before any network I/O starts.
    await Promise.resolve();
    let next = this.pending.shift();
    while (next !== undefined) {
      try {
        await this.send(next);
      } catch (err) {
        this.logger.warn({ err: errorMessage(err) }, "Notification send failed");
      }
      next = this.pending.shift();
    }
  }
}
