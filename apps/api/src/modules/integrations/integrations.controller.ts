import { Controller, Get } from "@nestjs/common";

import type { ExchangeStatus } from "./exchange-connection.service";
import { ExchangeConnectionService } from "./exchange-connection.service";

@Controller("integrations")
export class IntegrationsController {
  constructor(private readonly connection: ExchangeConnectionService) {}

  @Get("status")
  getStatus(): { exchange: ExchangeStatus } {
    return { exchange: this.connection.getStatus() };
  }
}
