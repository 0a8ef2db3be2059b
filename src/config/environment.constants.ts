/**
 * Environment Constants - every environment variable the service reads, parsed once at load
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { LOG_LEVELS } from "@/common/types/logging";
import type { DeviationScale } from "@/common/types/oracle";

export const DEVIATION_SCALES: readonly DeviationScale[] = ["raw", "bps"];

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    PORT: EnvironmentUtils.parseInt("APP_PORT", 3201, {
      min: 1,
      max: 65535,
      fieldName: "APP_PORT",
    }),
    BASE_PATH: EnvironmentUtils.parseString("APP_BASE_PATH", ""),
    CORS_MAX_AGE: EnvironmentUtils.parseInt("APP_CORS_MAX_AGE", 3600, { min: 300, max: 86400 }),
    // Comma separated; empty allows any origin
    CORS_ORIGINS: EnvironmentUtils.parseList("CORS_ORIGIN"),
    ENABLE_API_DOCS: EnvironmentUtils.parseBoolean("ENABLE_API_DOCS", false),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: EnvironmentUtils.parseEnum("LOG_LEVEL", "log", LOG_LEVELS),
    LOG_DIRECTORY: EnvironmentUtils.parseString("LOG_DIRECTORY", "logs"),
    ENABLE_FILE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_FILE_LOGGING", false),
    ENABLE_PERFORMANCE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_PERFORMANCE_LOGGING", false),
    ENABLE_DEBUG_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_DEBUG_LOGGING", false),
  },

  // Rate Limiting
  RATE_LIMITING: {
    MAX_REQUESTS: EnvironmentUtils.parseInt("RATE_LIMIT_MAX_REQUESTS", 600, { min: 1, max: 10000 }),
    WINDOW_MS: EnvironmentUtils.parseInt("RATE_LIMIT_WINDOW_MS", 60000, { min: 1000, max: 3600000 }),
  },

  TIMEOUTS: {
    GRACEFUL_SHUTDOWN_MS: EnvironmentUtils.parseInt("GRACEFUL_SHUTDOWN_TIMEOUT_MS", 30000, { min: 1000, max: 300000 }),
    CLEANUP_DELAY_MS: EnvironmentUtils.parseInt("CLEANUP_DELAY_MS", 100, { min: 50, max: 1000 }),
  },

  PERFORMANCE: {
    SLOW_RESPONSE_THRESHOLD_MS: EnvironmentUtils.parseInt("SLOW_RESPONSE_THRESHOLD_MS", 100, { min: 1, max: 60000 }),
  },

  // Oracle defaults, applied until an administrator changes them
  ORACLE: {
    ADMIN_ID: EnvironmentUtils.parseString("ORACLE_ADMIN_ID", "oracle-admin", { minLength: 1, maxLength: 128 }),
    AUTHORIZED_REPORTERS: EnvironmentUtils.parseList("ORACLE_AUTHORIZED_REPORTERS"),
    VALIDITY_PERIOD_SEC: EnvironmentUtils.parseInt("ORACLE_VALIDITY_PERIOD_SEC", 300, { min: 0 }),
    MAX_PRICE_DEVIATION: EnvironmentUtils.parseBigInt("ORACLE_MAX_PRICE_DEVIATION", 1000n),
    MIN_REQUIRED_SOURCES: EnvironmentUtils.parseInt("ORACLE_MIN_REQUIRED_SOURCES", 3, { min: 0 }),
    MIN_VOLUME_THRESHOLD: EnvironmentUtils.parseBigInt("ORACLE_MIN_VOLUME_THRESHOLD", 10000n),
    SLIPPAGE_TOLERANCE_BPS: EnvironmentUtils.parseBigInt("ORACLE_SLIPPAGE_TOLERANCE_BPS", 100n),
    DEFAULT_SOURCE_WEIGHT: EnvironmentUtils.parseInt("ORACLE_DEFAULT_SOURCE_WEIGHT", 50, { min: 0, max: 100 }),
    DEVIATION_SCALE: EnvironmentUtils.parseEnum("ORACLE_DEVIATION_SCALE", "raw", DEVIATION_SCALES),
  },
} as const;
