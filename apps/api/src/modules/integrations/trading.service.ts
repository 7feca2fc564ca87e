import crypto from "node:crypto";

import { Inject, Injectable } from "@nestjs/common";
import type { PositionSide } from "@hedgebot/shared";

import { OrderRejectedError, errorMessage } from "../bot/trading-errors";
import { ConfigService } from "../config/config.service";
import type { Logger } from "../logging/pino-logger";
import { LOGGER } from "../logging/pino-logger";
import type { MarketOrderFill } from "./ccxt-futures-adapter";
import { ExchangeConnectionService } from "./exchange-connection.service";

export type OrderSide = "BUY" | "SELL";

export type OrderRequest = {
  symbol: string;
  side: OrderSide;
  /** Position the order opens or reduces; both sides can be open at once. */
  positionSide: PositionSide;
  amount: number;
  reduceOnly: boolean;
  leverage: number;
  /** Price the decision was made at; paper fills use it, live fills fall back to it. */
  referencePrice: number;
};

export type OrderResult = {
  orderId: string;
  fillPrice: number;
  amount: number;
  paper: boolean;
};

export type OrderPlacer = {
  placeOrder(request: OrderRequest): Promise<OrderResult>;
};

export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

@Injectable()
export class TradingService implements OrderPlacer {
  constructor(
    private readonly configService: ConfigService,
    private readonly connection: ExchangeConnectionService,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  async placeOrder(request: OrderRequest): Promise<OrderResult> {
    if (!Number.isFinite(request.amount) || request.amount <= 0) {
      throw new OrderRejectedError(request.symbol, `Invalid order amount ${request.amount}`);
    }
    if (!Number.isFinite(request.referencePrice) || request.referencePrice <= 0) {
      throw new OrderRejectedError(request.symbol, `Invalid reference price ${request.referencePrice}`);
    }

    if (this.connection.isPaper()) {
      return {
        orderId: `paper-${crypto.randomUUID()}`,
        fillPrice: request.referencePrice,
        amount: request.amount,
        paper: true
      };
    }

    const timeoutMs = this.configService.load().trading.orderTimeoutMs;
    const adapter = this.connection.getAdapter();

    const placement = (async () => {
      if (!request.reduceOnly) {
        await adapter.ensureLeverage(request.symbol, request.leverage);
      }
      return await adapter.createMarketOrder({
        symbol: request.symbol,
        side: request.side,
        positionSide: request.positionSide,
        amount: request.amount,
        reduceOnly: request.reduceOnly
      });
    })();

    let fill: MarketOrderFill;
    try {
      fill = await withTimeout(
        placement,
        timeoutMs,
        () => new OrderRejectedError(request.symbol, `Order timed out after ${timeoutMs}ms`)
      );
    } catch (err) {
      if (err instanceof OrderRejectedError) {
        // The exchange may still fill a timed-out order; the kill switch is the cleanup path.
        void placement.catch((lateErr: unknown) =>
          this.logger.warn({ symbol: request.symbol, err: errorMessage(lateErr) }, "Late order failure after timeout")
        );
        throw err;
      }
      throw new OrderRejectedError(request.symbol, `Order rejected: ${errorMessage(err)}`, { cause: err });
    }

    const result: OrderResult = {
      orderId: fill.orderId,
      fillPrice: fill.fillPrice ?? request.referencePrice,
      amount: fill.filledAmount ?? request.amount,
      paper: false
    };
    if (!(result.fillPrice > 0) || !(result.amount > 0)) {
      throw new OrderRejectedError(request.symbol, `Order ${result.orderId} reported fill ${result.amount} @ ${result.fillPrice}`);
    }
    return result;
  }
}
