import { Test, TestingModule } from "@nestjs/testing";
import { AppModule } from "@/app.module";
import { ConfigService } from "@/config/config.service";
import { AdminController } from "@/controllers/admin.controller";
import { HealthController } from "@/controllers/health.controller";
import { PriceController } from "@/controllers/price.controller";
import { RateLimitGuard } from "@/common/rate-limiting/rate-limit.guard";
import { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import { ENV } from "@/config/environment.constants";
import { OracleService, PROOF_VERIFIER, ProofVerifierRegistry } from "@/oracle";

describe("AppModule", () => {
  let module: TestingModule;

  beforeEach(async () => {
    module = await Test.createTestingModule({ imports: [AppModule] }).compile();
  });

  afterEach(async () => {
    await module.close();
  });

  it("should resolve every controller", () => {
    expect(module.get(PriceController)).toBeInstanceOf(PriceController);
    expect(module.get(AdminController)).toBeInstanceOf(AdminController);
    expect(module.get(HealthController)).toBeInstanceOf(HealthController);
  });

  it("should seed the oracle from the environment defaults", () => {
    const oracle = module.get(OracleService);
    const config = module.get(ConfigService);

    expect(oracle.getAdministrator()).toBe(ENV.ORACLE.ADMIN_ID);
    expect(oracle.getConfiguration()).toEqual(config.getOracleDefaults());
  });

  it("should share one verifier registry under both tokens", () => {
    expect(module.get(PROOF_VERIFIER)).toBe(module.get(ProofVerifierRegistry));
  });

  it("should build the rate limiter from the environment", () => {
    const limiter = module.get(RateLimiterService);

    expect(limiter.getRateLimitConfig()).toMatchObject({
      windowMs: ENV.RATE_LIMITING.WINDOW_MS,
      maxRequests: ENV.RATE_LIMITING.MAX_REQUESTS,
    });
    expect(module.get(RateLimitGuard)).toBeInstanceOf(RateLimitGuard);
  });
});
