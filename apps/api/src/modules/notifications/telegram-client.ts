export type TelegramClientOptions = {
  botToken: string;
  chatId: string;
  timeoutMs?: number;
  baseUrl?: string;
  fetchFn?: typeof fetch;
};

export class TelegramClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: TelegramClientOptions) {
    this.baseUrl = (options.baseUrl ?? "https://api.telegram.org").replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async sendMessage(text: string): Promise<void> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await this.fetchFn(`${this.baseUrl}/bot${this.options.botToken}/sendMessage`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: this.options.chatId,
          text,
          parse_mode: "HTML",
          disable_web_page_preview: true
        }),
        signal: controller.signal
      });

      if (!res.ok) {
        const body = await res.text().catch(() => "");
        throw new Error(`Telegram HTTP ${res.status}: ${body.slice(0, 250)}`);
      }
    } finally {
      clearTimeout(t);
    }
  }
}
