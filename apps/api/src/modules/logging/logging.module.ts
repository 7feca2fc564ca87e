import { Global, Module } from "@nestjs/common";

import { LOGGER, createLogger } from "./pino-logger";

@Global()
@Module({
  providers: [{ provide: LOGGER, useFactory: createLogger }],
  exports: [LOGGER]
})
export class LoggingModule {}
