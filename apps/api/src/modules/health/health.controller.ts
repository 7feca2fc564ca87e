import { Controller, Get } from "@nestjs/common";

export type HealthResponse = {
  ok: true;
  ts: string;
  uptimeSec: number;
};

/** Liveness only; the API key guard lets this route through. */
@Controller("health")
export class HealthController {
  @Get()
  getHealth(): HealthResponse {
    return { ok: true, ts: new Date().toISOString(), uptimeSec: Math.round(process.uptime()) };
  }
}
