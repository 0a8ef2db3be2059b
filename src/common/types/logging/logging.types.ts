import type { LogLevel as NestLogLevel } from "@nestjs/common";

/**
 * Nest's own levels: "fatal" | "error" | "warn" | "log" | "debug" | "verbose"
 */
export type LogLevel = NestLogLevel;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  log: 3,
  debug: 4,
  verbose: 5,
};

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] <= LOG_LEVEL_PRIORITY[currentLevel];
}

/**
 * Levels from fatal down to (and including) the given one, as Nest's logger option expects
 */
export function enabledLogLevels(currentLevel: LogLevel): LogLevel[] {
  return LOG_LEVELS.filter(level => shouldLog(level, currentLevel));
}

export type SeverityLevel = "low" | "medium" | "high" | "critical";

export interface LogContext {
  component?: string;
  operation?: string;
  requestId?: string;
  assetId?: string;
  reporterId?: string;
  errorCode?: string;
  severity?: string;
  [key: string]: unknown;
}

export interface EnhancedLogContext extends LogContext {
  metadata?: Record<string, unknown>;
  additionalParams?: unknown[];
}

export type LogMessage = string | Error;

export interface StructuredLogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context: EnhancedLogContext;
}

export interface EnhancedErrorLogEntry {
  error: Error;
  context: LogContext;
  stackTrace: string;
  timestamp: number;
  severity: SeverityLevel;
  recoverable: boolean;
  errorCode: string;
  errorType: string;
}

export interface PerformanceLogEntry {
  operation: string;
  component: string;
  /** performance.now() readings */
  startTime: number;
  endTime: number;
  duration: number;
  success: boolean;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export interface ILogger {
  log(message: LogMessage, context?: EnhancedLogContext): void;
  error(message: LogMessage, context?: EnhancedLogContext): void;
  warn(message: LogMessage, context?: EnhancedLogContext): void;
  debug(message: LogMessage, context?: EnhancedLogContext): void;
  verbose(message: LogMessage, context?: EnhancedLogContext): void;
}
