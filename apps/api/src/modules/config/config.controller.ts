import { BadRequestException, Body, Controller, Get, Patch } from "@nestjs/common";
import { z } from "zod";

import type { RedactedConfig } from "./config.service";
import { ConfigService } from "./config.service";

const ConfigPatchSchema = z.record(z.unknown());

@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  getConfig(): RedactedConfig {
    return this.configService.redact(this.configService.load());
  }

  @Patch()
  updateConfig(@Body() body: unknown): RedactedConfig {
    const patch = ConfigPatchSchema.safeParse(body);
    if (!patch.success) {
      throw new BadRequestException("Config patch must be a JSON object.");
    }
    return this.configService.redact(this.configService.update(patch.data));
  }
}
