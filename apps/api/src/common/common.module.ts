import { Global, Module } from "@nestjs/common";
import { ApiConfigService } from "../config/api.config";
import { CLOCK, generateId, ID_GENERATOR, systemClock } from "./identity";

@Global()
@Module({
  providers: [
    { provide: ID_GENERATOR, useValue: generateId },
    { provide: CLOCK, useValue: systemClock },
    ApiConfigService
  ],
  exports: [ID_GENERATOR, CLOCK, ApiConfigService]
})
export class CommonModule {}
