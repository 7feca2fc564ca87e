import { Controller, Get, Post } from "@nestjs/common";
import type { BotState } from "@hedgebot/shared";

import { BotEngineService, type KillResult } from "./bot-engine.service";

@Controller("bot")
export class BotController {
  constructor(private readonly botEngine: BotEngineService) {}

  @Get("status")
  getStatus(): BotState {
    return this.botEngine.getState();
  }

  @Post("start")
  start(): { ok: true; phase: BotState["phase"] } {
    const state = this.botEngine.start();
    return { ok: true, phase: state.phase };
  }

  @Post("stop")
  async stop(): Promise<{ ok: true; phase: BotState["phase"] }> {
    const state = await this.botEngine.stop();
    return { ok: true, phase: state.phase };
  }

  @Post("kill")
  async kill(): Promise<{ ok: true } & KillResult> {
    const result = await this.botEngine.kill();
    return { ok: true, ...result };
  }

  @Get("decisions")
  getDecisions(): BotState["decisions"] {
    return this.botEngine.getState().decisions;
  }
}
