import { Logger } from "@nestjs/common";
import { EnhancedLoggerService } from "../../logging/enhanced-logger.service";
import type { Constructor } from "../../types/services/mixins";

export interface LoggingCapabilities {
  logInitialization(message?: string): void;
  logShutdown(message?: string): void;
  logPerformance(operation: string, duration: number, threshold?: number): void;
  logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, additionalData?: unknown): void;
  logCriticalOperation(operation: string, details: Record<string, unknown>, success?: boolean): void;
  startPerformanceTimer(operationId: string, operation: string, metadata?: Record<string, unknown>): void;
  endPerformanceTimer(operationId: string, success?: boolean, additionalMetadata?: Record<string, unknown>): void;
}

/**
 * Mixin that gives a class a Nest logger named after it, plus an optional enhanced logger
 * for audit trails and performance timers.
 */
export function WithLogging<TBase extends Constructor>(Base: TBase) {
  return class LoggingMixin extends Base implements LoggingCapabilities {
    public readonly logger: Logger;
    public enhancedLogger?: EnhancedLoggerService;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.logger = new Logger(this.constructor.name);
    }

    initializeEnhancedLogging(useEnhancedLogging: boolean): void {
      this.enhancedLogger = useEnhancedLogging ? new EnhancedLoggerService(this.constructor.name) : undefined;
    }

    logInitialization(message?: string): void {
      this.logger.log(message ?? `${this.constructor.name} initialized`);
    }

    logShutdown(message?: string): void {
      this.logger.log(message ?? `${this.constructor.name} shutting down`);
    }

    logPerformance(operation: string, duration: number, threshold = 1000): void {
      if (duration > threshold) {
        this.logger.warn(`Performance warning: ${operation} took ${duration}ms (threshold: ${threshold}ms)`);
      } else {
        this.logger.debug(`${operation} completed in ${duration}ms`);
      }
    }

    logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void {
      const prefix = context ? `[${context}] ` : "";
      if (this.enhancedLogger) {
        this.enhancedLogger.error(error, { component: this.constructor.name, operation: context, metadata: additionalData });
        return;
      }
      this.logger.error(`${prefix}${error.message}`, error.stack, additionalData);
    }

    logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void {
      const prefix = context ? `[${context}] ` : "";
      this.logger.warn(`${prefix}${message}`, additionalData);
    }

    logDebug(message: string, context?: string, additionalData?: unknown): void {
      const prefix = context ? `[${context}] ` : "";
      this.logger.debug(`${prefix}${message}`, additionalData);
    }

    /**
     * Administrative changes go through here. With enhanced logging on they also land in the audit log.
     */
    logCriticalOperation(operation: string, details: Record<string, unknown>, success = true): void {
      if (this.enhancedLogger) {
        this.enhancedLogger.logCriticalOperation(operation, this.constructor.name, details, success);
        return;
      }

      const message = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;
      if (success) {
        this.logger.log(message, details);
      } else {
        this.logger.error(message, details);
      }
    }

    startPerformanceTimer(operationId: string, operation: string, metadata?: Record<string, unknown>): void {
      this.enhancedLogger?.startPerformanceTimer(operationId, operation, this.constructor.name, metadata);
    }

    endPerformanceTimer(operationId: string, success = true, additionalMetadata?: Record<string, unknown>): void {
      this.enhancedLogger?.endPerformanceTimer(operationId, success, additionalMetadata);
    }
  };
}
