import { Controller, Get } from "@nestjs/common";
import { AllowAnonymous } from "./auth/auth.decorators";

export interface HealthStatus {
  status: "ok";
  uptime: number;
  service: string;
}

@Controller()
export class AppController {
  @Get("/health")
  @AllowAnonymous()
  getHealth(): HealthStatus {
    return { status: "ok", uptime: process.uptime(), service: "runfund-api" };
  }
}
