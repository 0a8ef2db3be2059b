/**
 * Health endpoint response types
 */

import type { ServiceHealth } from "@/common/base/mixins/monitoring.mixin";
import type { PerformanceStatistics } from "@/common/logging/performance-logger";
import type { RateLimitMetrics } from "@/common/rate-limiting/rate-limit.types";
import type { AssetId, OracleParameters } from "../oracle";

export interface LivenessResponse {
  status: "alive";
  timestamp: number;
  /** Seconds since the process started */
  uptime: number;
}

export interface ReadinessChecks {
  oracleInitialized: boolean;
  /** Authorized reporters cover the configured minimum of sources */
  enoughReporters: boolean;
}

export interface ReadinessResponse {
  ready: boolean;
  status: "ready" | "not_ready";
  timestamp: number;
  checks: ReadinessChecks;
}

export interface MemoryUsageSummary {
  /** Megabytes */
  used: number;
  /** Megabytes */
  total: number;
  percentage: number;
}

/** Oracle parameters as they appear in JSON: bigint fields become digit strings */
export type SerializedOracleParameters = {
  [K in keyof OracleParameters]: OracleParameters[K] extends bigint ? string : OracleParameters[K];
};

export interface OracleHealthDetails {
  administrator: string;
  authorizedReporters: number;
  configuration: SerializedOracleParameters;
  feeds: Record<AssetId, number>;
  counters: Record<string, number>;
}

export interface LoggingHealthDetails {
  totalErrors: number;
  errorsBySeverity: Record<string, number>;
  performance: PerformanceStatistics;
}

export interface HealthCheckResponse {
  status: ServiceHealth;
  timestamp: number;
  uptime: number;
  version: string;
  memory: MemoryUsageSummary;
  oracle: OracleHealthDetails;
  rateLimiting: RateLimitMetrics;
  /** Absent when the oracle runs without enhanced logging */
  logging?: LoggingHealthDetails;
}
