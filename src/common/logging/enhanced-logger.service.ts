import * as fs from "fs";
import * as path from "path";
import { Injectable, Logger } from "@nestjs/common";
import type { ILogger, LogMessage, EnhancedLogContext, StructuredLogEntry, LogLevel } from "../types/logging";
import { shouldLog } from "../types/logging";
import { ErrorLogger, type ErrorStatistics } from "./error-logger";
import { PerformanceLogger, type PerformanceStatistics } from "./performance-logger";

import { ENV } from "@/config/environment.constants";

/**
 * Structured logger with level filtering, optional JSON file sinks and an audit trail
 */
@Injectable()
export class EnhancedLoggerService implements ILogger {
  private readonly logger: Logger;
  private readonly logDirectory: string;
  private readonly applicationLogFile: string;
  private readonly debugLogFile: string;
  private readonly auditLogFile: string;

  private readonly errorLogger: ErrorLogger;
  private readonly performanceLogger: PerformanceLogger;

  private readonly enableFileLogging: boolean;
  private readonly enableDebugLogging: boolean;
  private readonly currentLogLevel: LogLevel;

  constructor(context: string = "EnhancedLogger") {
    this.logger = new Logger(context);

    this.enableFileLogging = ENV.LOGGING.ENABLE_FILE_LOGGING;
    this.enableDebugLogging = ENV.LOGGING.ENABLE_DEBUG_LOGGING;
    this.currentLogLevel = ENV.LOGGING.LOG_LEVEL;
    this.logDirectory = path.join(process.cwd(), ENV.LOGGING.LOG_DIRECTORY);

    this.applicationLogFile = path.join(this.logDirectory, "application.log");
    this.debugLogFile = path.join(this.logDirectory, "debug.log");
    this.auditLogFile = path.join(this.logDirectory, "audit.log");

    this.initializeLogDirectory();

    this.errorLogger = new ErrorLogger(context, this.logDirectory, 1000, this.enableFileLogging);
    this.performanceLogger = new PerformanceLogger(
      context,
      this.logDirectory,
      ENV.LOGGING.ENABLE_PERFORMANCE_LOGGING,
      this.enableFileLogging
    );
  }

  log(message: LogMessage, context?: EnhancedLogContext): void {
    this.write("log", message, context);
  }

  /**
   * Error objects go through the error logger, which classifies them and keeps history
   */
  error(message: LogMessage, context?: EnhancedLogContext): void {
    if (!shouldLog("error", this.currentLogLevel)) {
      return;
    }
    if (message instanceof Error) {
      this.errorLogger.logError(message, context);
      return;
    }
    this.write("error", message, context);
  }

  warn(message: LogMessage, context?: EnhancedLogContext): void {
    this.write("warn", message, context);
  }

  debug(message: LogMessage, context?: EnhancedLogContext): void {
    if (!this.enableDebugLogging) {
      return;
    }
    this.write("debug", message, context);
  }

  verbose(message: LogMessage, context?: EnhancedLogContext): void {
    this.write("verbose", message, context);
  }

  fatal(message: LogMessage, context?: EnhancedLogContext): void {
    this.write("fatal", message, context);
  }

  startPerformanceTimer(
    operationId: string,
    operation: string,
    component: string,
    metadata?: Record<string, unknown>
  ): void {
    this.performanceLogger.startTimer(operationId, operation, component, metadata);
  }

  endPerformanceTimer(
    operationId: string,
    success: boolean = true,
    additionalMetadata?: Record<string, unknown>
  ): number | undefined {
    return this.performanceLogger.endTimer(operationId, success, additionalMetadata);
  }

  /**
   * Administrative changes. Written to the audit log when file logging is on.
   */
  logCriticalOperation(
    operation: string,
    component: string,
    details: Record<string, unknown>,
    success: boolean = true
  ): void {
    const context: EnhancedLogContext = {
      component,
      operation,
      severity: success ? "low" : "high",
      metadata: details,
    };

    const message = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;
    if (success) {
      this.log(message, context);
    } else {
      this.error(message, context);
    }

    if (this.enableFileLogging) {
      this.writeAuditLog(operation, component, details, success);
    }
  }

  logSubmission(assetId: string, reporterId: string, price: bigint, rejection?: string): void {
    const context: EnhancedLogContext = {
      component: "Submission",
      operation: rejection ? "submission_rejected" : "submission_accepted",
      assetId,
      reporterId,
      metadata: { price: price.toString(), rejection },
    };

    if (rejection) {
      this.warn(`Submission rejected: ${assetId} from ${reporterId} (${rejection})`, context);
    } else {
      this.debug(`Submission accepted: ${assetId} = ${price} from ${reporterId}`, context);
    }
  }

  logAggregation(assetId: string, sourceCount: number, excludedCount: number, price: bigint): void {
    const context: EnhancedLogContext = {
      component: "Aggregation",
      operation: "price_aggregated",
      assetId,
      metadata: { sourceCount, excludedCount, price: price.toString() },
    };

    this.debug(`Price aggregated: ${assetId} = ${price} (${sourceCount} sources, ${excludedCount} excluded)`, context);
  }

  getErrorStatistics(): ErrorStatistics {
    return this.errorLogger.getStatistics();
  }

  getPerformanceStatistics(): PerformanceStatistics {
    return this.performanceLogger.getStatistics();
  }

  private write(level: LogLevel, message: LogMessage, context?: EnhancedLogContext): void {
    if (!shouldLog(level, this.currentLogLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, context);
    switch (level) {
      case "fatal":
        this.logger.error(`[FATAL] ${entry.message}`, entry.context);
        break;
      case "error":
        this.logger.error(entry.message, entry.context);
        break;
      case "warn":
        this.logger.warn(entry.message, entry.context);
        break;
      case "debug":
        this.logger.debug(entry.message, entry.context);
        break;
      case "verbose":
        this.logger.verbose(entry.message, entry.context);
        break;
      default:
        this.logger.log(entry.message, entry.context);
    }

    if (this.enableFileLogging) {
      this.writeToFile(entry);
    }
  }

  private createLogEntry(level: LogLevel, message: LogMessage, context?: EnhancedLogContext): StructuredLogEntry {
    return {
      level,
      message: typeof message === "string" ? message : message.message,
      timestamp: Date.now(),
      context: { pid: process.pid, ...context },
    };
  }

  private initializeLogDirectory(): void {
    if (!this.enableFileLogging) {
      return;
    }

    try {
      fs.mkdirSync(this.logDirectory, { recursive: true });
    } catch (error) {
      this.logger.error("Failed to create log directory:", error);
    }
  }

  private writeToFile(entry: StructuredLogEntry): void {
    try {
      const logLine =
        JSON.stringify({ ...entry, timestamp: new Date(entry.timestamp).toISOString() }, (_key, value: unknown) =>
          typeof value === "bigint" ? value.toString() : value
        ) + "\n";
      const logFile = entry.level === "debug" ? this.debugLogFile : this.applicationLogFile;
      fs.appendFileSync(logFile, logLine);
    } catch (error) {
      // not routed through the logger, which would recurse
      console.error("Failed to write to log file:", error);
    }
  }

  private writeAuditLog(
    operation: string,
    component: string,
    details: Record<string, unknown>,
    success: boolean
  ): void {
    try {
      const auditEntry = {
        timestamp: new Date().toISOString(),
        operation,
        component,
        success,
        details,
        pid: process.pid,
      };
      fs.appendFileSync(
        this.auditLogFile,
        JSON.stringify(auditEntry, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)) +
          "\n"
      );
    } catch (error) {
      console.error("Failed to write audit log:", error);
    }
  }
}
