import { Controller, Get, Post } from "@nestjs/common";
import type { UniverseSnapshot } from "@hedgebot/shared";

import { UniverseService } from "./universe.service";

@Controller("universe")
export class UniverseController {
  constructor(private readonly universe: UniverseService) {}

  @Get()
  latest(): UniverseSnapshot | { symbols: []; source: null } {
    return this.universe.getLatest() ?? { symbols: [], source: null };
  }

  @Post("refresh")
  async refresh(): Promise<UniverseSnapshot> {
    return await this.universe.refresh();
  }
}
