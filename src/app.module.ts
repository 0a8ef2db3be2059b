import { Module } from "@nestjs/common";

import { AdminController } from "@/controllers/admin.controller";
import { HealthController } from "@/controllers/health.controller";
import { PriceController } from "@/controllers/price.controller";

import { ConfigModule } from "@/config/config.module";
import { OracleModule } from "@/oracle/oracle.module";

import { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import { RateLimitGuard } from "@/common/rate-limiting/rate-limit.guard";
import { ENV } from "@/config/environment.constants";

@Module({
  imports: [ConfigModule, OracleModule],
  controllers: [PriceController, AdminController, HealthController],
  providers: [
    {
      provide: RateLimiterService,
      useFactory: () =>
        new RateLimiterService({
          windowMs: ENV.RATE_LIMITING.WINDOW_MS,
          maxRequests: ENV.RATE_LIMITING.MAX_REQUESTS,
          skipSuccessfulRequests: false,
          skipFailedRequests: false,
        }),
    },
    {
      provide: RateLimitGuard,
      useFactory: (rateLimiterService: RateLimiterService) => new RateLimitGuard(rateLimiterService),
      inject: [RateLimiterService],
    },
  ],
})
export class AppModule {}
