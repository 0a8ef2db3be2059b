import { Global, Module } from "@nestjs/common";
import { ConfigService } from "./config.service";
import { ENV } from "./environment.constants";

@Global()
@Module({
  providers: [
    {
      provide: ConfigService,
      useFactory: () => new ConfigService(ENV.ORACLE),
    },
  ],
  exports: [ConfigService],
})
export class ConfigModule {}
