import type { Logger } from "@nestjs/common";

/**
 * Type utilities for mixins
 */

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = object> = new (...args: any[]) => T;

/**
 * What every capability mixin above the logging layer can rely on
 */
export interface LoggedInstance {
  readonly logger: Logger;
  logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, additionalData?: unknown): void;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
