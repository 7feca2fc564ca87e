import { Injectable } from "@nestjs/common";

import { ConfigService } from "../config/config.service";
import { CcxtFuturesAdapter } from "./ccxt-futures-adapter";

export type ExchangeStatus = {
  checkedAt: string;
  environment: "PAPER" | "TESTNET" | "MAINNET";
  paperTrading: boolean;
  credentialsConfigured: boolean;
};

/**
 * Owns the ccxt client. Paper mode still reads public mainnet market data; only order
 * placement is simulated.
 */
@Injectable()
export class ExchangeConnectionService {
  private adapter: CcxtFuturesAdapter | null = null;
  private adapterKey: string | null = null;

  constructor(private readonly configService: ConfigService) {}

  isPaper(): boolean {
    return this.configService.load().exchange.environment === "PAPER";
  }

  getAdapter(): CcxtFuturesAdapter {
    const config = this.configService.load();
    const { environment, apiKey, apiSecret } = config.exchange;
    const key = [environment, apiKey ?? "", apiSecret ?? "", config.trading.orderTimeoutMs].join("|");
    if (this.adapter && this.adapterKey === key) return this.adapter;

    this.adapter = new CcxtFuturesAdapter({
      env: environment === "TESTNET" ? "TESTNET" : "MAINNET",
      apiKey: environment === "PAPER" ? undefined : apiKey,
      apiSecret: environment === "PAPER" ? undefined : apiSecret,
      timeoutMs: config.trading.orderTimeoutMs
    });
    this.adapterKey = key;
    return this.adapter;
  }

  getStatus(): ExchangeStatus {
    const { environment, apiKey, apiSecret } = this.configService.load().exchange;
    return {
      checkedAt: new Date().toISOString(),
      environment,
      paperTrading: environment === "PAPER",
      credentialsConfigured: Boolean(apiKey && apiSecret)
    };
  }
}
