import { Module } from "@nestjs/common";

import { ExchangeConnectionService } from "./exchange-connection.service";
import { IntegrationsController } from "./integrations.controller";
import { MarketDataService } from "./market-data.service";
import { TradingService } from "./trading.service";

@Module({
  controllers: [IntegrationsController],
  providers: [ExchangeConnectionService, MarketDataService, TradingService],
  exports: [ExchangeConnectionService, MarketDataService, TradingService]
})
export class IntegrationsModule {}
