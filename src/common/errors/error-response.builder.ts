import { HttpException, HttpStatus } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import type { ApiErrorResponse } from "@/common/types/error-handling";
import { ApiErrorCodes, ORACLE_ERROR_MAPPINGS } from "@/common/types/error-handling";
import type { OracleErrorKind } from "@/common/types/oracle";

/**
 * Builds the HttpExceptions the API layer throws, all with one body shape
 */
export class ErrorResponseBuilder {
  static generateRequestId(): string {
    return uuidv4();
  }

  static createErrorResponse(
    errorCode: ApiErrorCodes,
    message: string,
    requestId?: string,
    details?: Record<string, unknown>
  ): ApiErrorResponse {
    return {
      error: ApiErrorCodes[errorCode],
      code: errorCode,
      message,
      timestamp: Date.now(),
      requestId: requestId ?? this.generateRequestId(),
      details,
    };
  }

  /**
   * Translate an oracle error kind into its HTTP form
   */
  static createOracleError(
    kind: OracleErrorKind,
    requestId?: string,
    details?: Record<string, unknown>
  ): HttpException {
    const mapping = ORACLE_ERROR_MAPPINGS[kind];
    const body = this.createErrorResponse(mapping.code, mapping.message, requestId, { kind, ...details });
    return new HttpException(body, mapping.status);
  }

  static createValidationError(message: string, requestId?: string, details?: Record<string, unknown>): HttpException {
    return new HttpException(
      this.createErrorResponse(ApiErrorCodes.INVALID_REQUEST, message, requestId, details),
      HttpStatus.BAD_REQUEST
    );
  }

  static createRateLimitError(requestId?: string, details?: Record<string, unknown>): HttpException {
    return new HttpException(
      this.createErrorResponse(ApiErrorCodes.RATE_LIMIT_EXCEEDED, "Rate limit exceeded", requestId, details),
      HttpStatus.TOO_MANY_REQUESTS
    );
  }
}
