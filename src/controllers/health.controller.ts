import { Controller, Get, HttpException, HttpStatus } from "@nestjs/common";
import { ApiExtraModels, ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";

import { BaseController } from "@/common/base/base.controller";
import { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import type {
  HealthCheckResponse,
  LivenessResponse,
  LoggingHealthDetails,
  MemoryUsageSummary,
  ReadinessResponse,
} from "@/common/types/monitoring";
import { OracleService } from "@/oracle/oracle.service";
import { OracleParametersDto } from "./dto/admin.dto";
import { HttpErrorResponseDto } from "./dto/common-error.dto";
import { HealthCheckResponseDto, LivenessResponseDto, ReadinessResponseDto } from "./dto/health-metrics.dto";

const APP_VERSION = "1.0.0";
const BYTES_PER_MB = 1024 * 1024;

@ApiTags("System Health")
@Controller("health")
@ApiExtraModels(HealthCheckResponseDto, ReadinessResponseDto, LivenessResponseDto, HttpErrorResponseDto)
// Not rate limited: orchestrators poll these
export class HealthController extends BaseController {
  constructor(
    private readonly oracle: OracleService,
    private readonly rateLimiter: RateLimiterService
  ) {
    super();
  }

  @Get("live")
  @ApiOperation({ summary: "Liveness probe", description: "Succeeds while the process can serve requests" })
  @ApiResponse({ status: 200, type: LivenessResponseDto })
  getLiveness(): LivenessResponse {
    this.incrementCounter("liveness_checks");
    return {
      status: "alive",
      timestamp: Date.now(),
      uptime: process.uptime(),
    };
  }

  @Get("ready")
  @ApiOperation({
    summary: "Readiness probe",
    description: "Ready once the oracle is initialized and enough reporters are authorized to aggregate",
  })
  @ApiResponse({ status: 200, type: ReadinessResponseDto })
  @ApiResponse({ status: 503, description: "Not ready", type: HttpErrorResponseDto })
  getReadiness(): ReadinessResponse {
    const { minRequiredSources } = this.oracle.getConfiguration();
    const checks = {
      oracleInitialized: this.oracle.isServiceInitialized() && !this.oracle.isServiceDestroyed(),
      enoughReporters: this.oracle.getStatus().authorizedReporters >= minRequiredSources,
    };
    const ready = checks.oracleInitialized && checks.enoughReporters;
    const response: ReadinessResponse = {
      ready,
      status: ready ? "ready" : "not_ready",
      timestamp: Date.now(),
      checks,
    };

    if (!ready) {
      this.incrementCounter("readiness_failures");
      this.logger.warn("Readiness check failed", checks);
      throw new HttpException({ message: "Service is not ready", details: response }, HttpStatus.SERVICE_UNAVAILABLE);
    }
    return response;
  }

  @Get()
  @ApiOperation({
    summary: "Detailed health",
    description: "Service status, memory, oracle configuration, stored entries per asset, submission counters, rate limiting and logged errors",
  })
  @ApiResponse({ status: 200, type: HealthCheckResponseDto })
  getHealth(): HealthCheckResponse {
    const startTime = performance.now();
    const status = this.oracle.getStatus();

    const response: HealthCheckResponse = {
      status: status.status,
      timestamp: Date.now(),
      uptime: process.uptime(),
      version: APP_VERSION,
      memory: this.summarizeMemory(),
      oracle: {
        administrator: status.administrator,
        authorizedReporters: status.authorizedReporters,
        configuration: OracleParametersDto.from(this.oracle.getConfiguration()),
        feeds: status.feeds,
        counters: status.counters,
      },
      rateLimiting: this.rateLimiter.getStats(),
      logging: this.summarizeLogging(),
    };

    this.logPerformance("getHealth", performance.now() - startTime);
    return response;
  }

  private summarizeLogging(): LoggingHealthDetails | undefined {
    const logger = this.oracle.enhancedLogger;
    if (!logger) {
      return undefined;
    }
    const { totalErrors, errorsBySeverity } = logger.getErrorStatistics();
    return { totalErrors, errorsBySeverity, performance: logger.getPerformanceStatistics() };
  }

  private summarizeMemory(): MemoryUsageSummary {
    const { heapUsed, heapTotal } = process.memoryUsage();
    return {
      used: Math.round(heapUsed / BYTES_PER_MB),
      total: Math.round(heapTotal / BYTES_PER_MB),
      percentage: heapTotal > 0 ? Math.round((heapUsed / heapTotal) * 100) : 0,
    };
  }
}
