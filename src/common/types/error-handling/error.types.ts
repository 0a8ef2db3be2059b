/**
 * Severity of an error, used for log routing and retry hints
 */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

export enum ErrorCode {
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",
  FORBIDDEN = "FORBIDDEN",
  SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
}

export interface IErrorDetails {
  /** Machine-readable code */
  code: string;
  message: string;
  severity: ErrorSeverity;
  module?: string;
  timestamp?: number;
  context?: Record<string, unknown>;
}

export interface StandardErrorResponse {
  success: false;
  error: IErrorDetails;
  timestamp: number;
  requestId?: string;
}

/**
 * Body of every error response the API sends
 */
export interface EnhancedErrorResponse extends StandardErrorResponse {
  retryable: boolean;
  /** Milliseconds */
  retryAfter?: number;
}

export enum StandardErrorClassification {
  VALIDATION_ERROR = "VALIDATION_ERROR",
  AUTHENTICATION_ERROR = "AUTHENTICATION_ERROR",
  AUTHORIZATION_ERROR = "AUTHORIZATION_ERROR",
  NOT_FOUND_ERROR = "NOT_FOUND_ERROR",
  RATE_LIMIT_ERROR = "RATE_LIMIT_ERROR",
  TIMEOUT_ERROR = "TIMEOUT_ERROR",
  SERVICE_UNAVAILABLE_ERROR = "SERVICE_UNAVAILABLE_ERROR",
  PROCESSING_ERROR = "PROCESSING_ERROR",
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
}

export interface StandardErrorMetadata {
  classification: StandardErrorClassification;
  retryable: boolean;
  severity: ErrorSeverity;
  component: string;
  correlationId?: string;
  additionalContext?: Record<string, unknown>;
}

export function createErrorResponse(error: IErrorDetails | Error, requestId?: string): StandardErrorResponse {
  const details: IErrorDetails =
    error instanceof Error
      ? { code: ErrorCode.UNKNOWN_ERROR, message: error.message, severity: ErrorSeverity.HIGH }
      : error;

  return {
    success: false,
    error: { ...details, timestamp: details.timestamp ?? Date.now() },
    timestamp: Date.now(),
    requestId,
  };
}

export function createEnhancedErrorResponse(
  error: IErrorDetails | Error,
  metadata: Partial<StandardErrorMetadata>,
  requestId?: string
): EnhancedErrorResponse {
  const base = createErrorResponse(error, requestId);
  const retryable = metadata.retryable ?? false;

  return {
    ...base,
    error: {
      ...base.error,
      severity: metadata.severity ?? base.error.severity,
      module: metadata.component ?? base.error.module,
      context: {
        classification: metadata.classification ?? StandardErrorClassification.UNKNOWN_ERROR,
        ...metadata.additionalContext,
      },
    },
    retryable,
    retryAfter: retryable ? calculateRetryAfter(metadata.severity) : undefined,
  };
}

function calculateRetryAfter(severity?: ErrorSeverity): number {
  switch (severity) {
    case ErrorSeverity.LOW:
      return 1000;
    case ErrorSeverity.HIGH:
      return 15000;
    case ErrorSeverity.CRITICAL:
      return 60000;
    default:
      return 5000;
  }
}

export function isEnhancedErrorResponse(obj: unknown): obj is EnhancedErrorResponse {
  return (
    typeof obj === "object" &&
    obj !== null &&
    "success" in obj &&
    obj.success === false &&
    "error" in obj &&
    typeof obj.error === "object" &&
    obj.error !== null &&
    "retryable" in obj
  );
}
