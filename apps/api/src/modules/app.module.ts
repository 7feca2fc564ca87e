import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";

import { BotModule } from "./bot/bot.module";
import { ConfigModule } from "./config/config.module";
import { HealthModule } from "./health/health.module";
import { IntegrationsModule } from "./integrations/integrations.module";
import { LoggingModule } from "./logging/logging.module";
import { NotificationsModule } from "./notifications/notifications.module";
import { PortfolioModule } from "./portfolio/portfolio.module";
import { ApiKeyGuard } from "./security/api-key.guard";
import { UniverseModule } from "./universe/universe.module";

@Module({
  imports: [
    LoggingModule,
    ConfigModule,
    HealthModule,
    IntegrationsModule,
    UniverseModule,
    NotificationsModule,
    BotModule,
    PortfolioModule
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard
    }
  ]
})
export class AppModule {}
