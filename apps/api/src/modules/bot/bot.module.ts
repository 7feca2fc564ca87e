import { Module } from "@nestjs/common";

import { IntegrationsModule } from "../integrations/integrations.module";
import { NotificationsModule } from "../notifications/notifications.module";
import { UniverseModule } from "../universe/universe.module";
import { BotController } from "./bot.controller";
import { BotEngineService } from "./bot-engine.service";

@Module({
  imports: [IntegrationsModule, UniverseModule, NotificationsModule],
  controllers: [BotController],
  providers: [BotEngineService],
  exports: [BotEngineService]
})
export class BotModule {}
