import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from "@nestjs/common";
import type { Request } from "express";

import { ConfigService } from "../config/config.service";

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request>();
    const path = req.path ?? req.url;

    if (path === "/health") {
      return true;
    }

    const expected = this.configService.load().api.apiKey;
    if (!expected) {
      throw new UnauthorizedException("API key is not configured. Restart the API to generate one.");
    }

    const apiKey = req.header("x-api-key");
    if (!apiKey) {
      throw new UnauthorizedException("Missing x-api-key header.");
    }

    if (apiKey !== expected) {
      throw new UnauthorizedException("Invalid API key.");
    }

    return true;
  }
}
