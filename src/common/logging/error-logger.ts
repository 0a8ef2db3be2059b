import * as fs from "fs";
import * as path from "path";
import { Logger } from "@nestjs/common";
import type { EnhancedErrorLogEntry, LogContext, SeverityLevel } from "../types/logging";

const SEVERITIES: readonly SeverityLevel[] = ["low", "medium", "high", "critical"];

function isSeverityLevel(value: unknown): value is SeverityLevel {
  return SEVERITIES.some(severity => severity === value);
}

function readStringProperty(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

export interface ErrorStatistics {
  totalErrors: number;
  errorsBySeverity: Record<string, number>;
  errorsByType: Record<string, number>;
  errorsByComponent: Record<string, number>;
  recentErrors: EnhancedErrorLogEntry[];
}

/**
 * Keeps a bounded history of logged errors and writes each one, with its context, to the Nest logger
 */
export class ErrorLogger {
  private readonly logger: Logger;
  private readonly errorHistory: EnhancedErrorLogEntry[] = [];
  private readonly errorLogFile: string;

  constructor(
    context: string,
    logDirectory: string,
    private readonly maxErrorHistory = 1000,
    private readonly enableFileLogging = false
  ) {
    this.logger = new Logger(`${context}:Error`);
    this.errorLogFile = path.join(logDirectory, "errors.log");
  }

  logError(error: Error, context: LogContext = {}): EnhancedErrorLogEntry {
    const entry: EnhancedErrorLogEntry = {
      error,
      context,
      stackTrace: error.stack ?? "No stack trace available",
      timestamp: Date.now(),
      severity: this.determineSeverity(error, context),
      recoverable: this.isRecoverableError(error),
      errorCode: readStringProperty(error, "code") ?? context.errorCode ?? "UNKNOWN_ERROR",
      errorType: error.name || error.constructor.name,
    };

    this.errorHistory.push(entry);
    if (this.errorHistory.length > this.maxErrorHistory) {
      this.errorHistory.shift();
    }

    this.logger.error(this.formatErrorMessage(entry));

    if (this.enableFileLogging) {
      this.writeToFile(entry);
    }
    return entry;
  }

  getStatistics(): ErrorStatistics {
    const errorsBySeverity: Record<string, number> = {};
    const errorsByType: Record<string, number> = {};
    const errorsByComponent: Record<string, number> = {};

    const oneHourAgo = Date.now() - 3_600_000;
    const recentErrors = this.errorHistory.filter(entry => entry.timestamp > oneHourAgo);

    for (const entry of this.errorHistory) {
      errorsBySeverity[entry.severity] = (errorsBySeverity[entry.severity] ?? 0) + 1;
      errorsByType[entry.errorType] = (errorsByType[entry.errorType] ?? 0) + 1;
      const component = entry.context.component ?? "unknown";
      errorsByComponent[component] = (errorsByComponent[component] ?? 0) + 1;
    }

    return {
      totalErrors: this.errorHistory.length,
      errorsBySeverity,
      errorsByType,
      errorsByComponent,
      recentErrors,
    };
  }

  private determineSeverity(error: Error, context: LogContext): SeverityLevel {
    if (isSeverityLevel(context.severity)) {
      return context.severity;
    }

    const message = error.message.toLowerCase();

    if (message.includes("fatal") || message.includes("critical")) {
      return "critical";
    }
    if (message.includes("unauthorized") || message.includes("administrator") || message.includes("time source")) {
      return "high";
    }
    if (message.includes("validation") || message.includes("deviation") || message.includes("rate limit")) {
      return "medium";
    }
    return "low";
  }

  private isRecoverableError(error: Error): boolean {
    const message = error.message.toLowerCase();
    const nonRecoverablePatterns = ["unauthorized", "forbidden", "invalid format", "configuration"];
    return !nonRecoverablePatterns.some(pattern => message.includes(pattern));
  }

  private formatErrorMessage(entry: EnhancedErrorLogEntry): string {
    const { error, context, severity, recoverable, errorCode, errorType } = entry;

    let message = `[${severity.toUpperCase()}] ${error.message} (Code: ${errorCode}) (Type: ${errorType})`;

    if (context.component) {
      message += ` [Component: ${context.component}]`;
    }
    if (context.assetId) {
      message += ` [Asset: ${context.assetId}]`;
    }
    if (context.reporterId) {
      message += ` [Reporter: ${context.reporterId}]`;
    }
    if (context.operation) {
      message += ` [Operation: ${context.operation}]`;
    }

    return `${message} [Recoverable: ${recoverable ? "Yes" : "No"}]`;
  }

  private writeToFile(entry: EnhancedErrorLogEntry): void {
    try {
      const logLine =
        JSON.stringify({
          ...entry,
          error: { name: entry.error.name, message: entry.error.message },
          timestamp: new Date(entry.timestamp).toISOString(),
        }) + "\n";
      fs.appendFileSync(this.errorLogFile, logLine);
    } catch (error) {
      console.error("Failed to write error to log file:", error);
    }
  }
}
