import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import type { ServiceHealth } from "@/common/base/mixins/monitoring.mixin";
import type { AssetId } from "@/common/types/oracle";
import { OracleParametersDto } from "./admin.dto";

export class LivenessResponseDto {
  @ApiProperty({ enum: ["alive"], example: "alive" })
  status!: "alive";

  @ApiProperty({ description: "Check timestamp in milliseconds", example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Process uptime in seconds", example: 3600 })
  uptime!: number;
}

export class ReadinessChecksDto {
  @ApiProperty({ description: "Oracle service finished initialization", example: true })
  oracleInitialized!: boolean;

  @ApiProperty({ description: "Authorized reporters cover the minimum required sources", example: true })
  enoughReporters!: boolean;
}

export class ReadinessResponseDto {
  @ApiProperty({ description: "Whether the service accepts traffic", example: true })
  ready!: boolean;

  @ApiProperty({ enum: ["ready", "not_ready"], example: "ready" })
  status!: "ready" | "not_ready";

  @ApiProperty({ example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ type: ReadinessChecksDto })
  checks!: ReadinessChecksDto;
}

export class MemoryUsageDto {
  @ApiProperty({ description: "Heap used in MB", example: 64 })
  used!: number;

  @ApiProperty({ description: "Heap total in MB", example: 128 })
  total!: number;

  @ApiProperty({ description: "Heap used as a percentage of heap total", example: 50 })
  percentage!: number;
}

export class OracleHealthDetailsDto {
  @ApiProperty({ example: "oracle-admin" })
  administrator!: string;

  @ApiProperty({ example: 3 })
  authorizedReporters!: number;

  @ApiProperty({ type: OracleParametersDto })
  configuration!: OracleParametersDto;

  @ApiProperty({
    description: "Stored entries per asset",
    additionalProperties: { type: "number" },
    example: { BTC: 3, ETH: 2, SOL: 0 },
  })
  feeds!: Record<AssetId, number>;

  @ApiProperty({
    description: "Oracle service counters",
    additionalProperties: { type: "number" },
    example: { submissions_accepted: 12, submissions_rejected: 1 },
  })
  counters!: Record<string, number>;
}

export class PerformanceStatisticsDto {
  @ApiProperty({ example: 0 })
  activeOperations!: number;

  @ApiProperty({ example: 4 })
  completedOperations!: number;

  @ApiProperty({ example: 0 })
  failedOperations!: number;

  @ApiProperty({ description: "Milliseconds", example: 1.5 })
  averageOperationTime!: number;
}

export class LoggingHealthDetailsDto {
  @ApiProperty({ example: 0 })
  totalErrors!: number;

  @ApiProperty({ additionalProperties: { type: "number" }, example: { high: 1 } })
  errorsBySeverity!: Record<string, number>;

  @ApiProperty({ type: PerformanceStatisticsDto })
  performance!: PerformanceStatisticsDto;
}

export class RateLimitMetricsDto {
  @ApiProperty({ example: 4 })
  totalClients!: number;

  @ApiProperty({ example: 120 })
  totalRequests!: number;

  @ApiProperty({ example: 118 })
  allowedRequests!: number;

  @ApiProperty({ example: 2 })
  blockedRequests!: number;

  @ApiProperty({ description: "Share of requests allowed, 1 when none were seen", example: 0.98 })
  hitRate!: number;
}

export class HealthCheckResponseDto {
  @ApiProperty({ enum: ["healthy", "degraded", "unhealthy"], example: "healthy" })
  status!: ServiceHealth;

  @ApiProperty({ example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Process uptime in seconds", example: 3600 })
  uptime!: number;

  @ApiProperty({ example: "1.0.0" })
  version!: string;

  @ApiProperty({ type: MemoryUsageDto })
  memory!: MemoryUsageDto;

  @ApiProperty({ type: OracleHealthDetailsDto })
  oracle!: OracleHealthDetailsDto;

  @ApiProperty({ type: RateLimitMetricsDto })
  rateLimiting!: RateLimitMetricsDto;

  @ApiPropertyOptional({ type: LoggingHealthDetailsDto })
  logging?: LoggingHealthDetailsDto;
}
