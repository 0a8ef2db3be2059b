import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import type { EnhancedErrorResponse, StandardErrorMetadata } from "@/common/types/error-handling";
import {
  ErrorSeverity,
  StandardErrorClassification,
  createEnhancedErrorResponse,
  isEnhancedErrorResponse,
} from "@/common/types/error-handling";

/**
 * Global filter: every exception leaves the API as an EnhancedErrorResponse
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const requestMetadata = this.extractRequestMetadata(request);

    let errorResponse: EnhancedErrorResponse;
    let status: HttpStatus;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      errorResponse = this.handleHttpException(exception, requestMetadata);
    } else if (exception instanceof Error) {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorResponse = this.handleGenericError(exception, requestMetadata);
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      errorResponse = this.handleUnknownError(exception, requestMetadata);
    }

    errorResponse = this.ensureStandardizedResponse(errorResponse, status, request);

    response.setHeader("X-Content-Type-Options", "nosniff");
    if (errorResponse.retryAfter) {
      response.setHeader("Retry-After", Math.ceil(errorResponse.retryAfter / 1000));
    }

    this.logError(exception, errorResponse, request, status);

    response.status(status).json(errorResponse);
  }

  private handleHttpException(exception: HttpException, requestMetadata: StandardErrorMetadata): EnhancedErrorResponse {
    const status = exception.getStatus();
    const exceptionResponse = exception.getResponse();

    if (isEnhancedErrorResponse(exceptionResponse)) {
      return exceptionResponse;
    }

    const retryable = this.isStatusRetryable(status);
    const base: EnhancedErrorResponse = {
      success: false,
      error: {
        code: "HTTP_EXCEPTION",
        message: exception.message,
        severity: this.getSeverityForStatus(status),
        module: requestMetadata.component,
        timestamp: Date.now(),
        context: {
          classification: this.classifyHttpStatus(status),
          ...requestMetadata.additionalContext,
        },
      },
      timestamp: Date.now(),
      requestId: requestMetadata.correlationId,
      retryable,
      retryAfter: retryable ? this.calculateRetryAfter(status) : undefined,
    };

    if (typeof exceptionResponse !== "object" || exceptionResponse === null) {
      return base;
    }

    // Bodies from ErrorResponseBuilder carry error/code/message/requestId/details;
    // Nest's own (ValidationPipe, NotFound) carry message as a string or string[]
    const code = this.readString(exceptionResponse, "error") ?? base.error.code;
    const message = this.readMessage(exceptionResponse) ?? base.error.message;
    const apiCode: unknown = Reflect.get(exceptionResponse, "code");
    const details: unknown = Reflect.get(exceptionResponse, "details");

    return {
      ...base,
      error: {
        ...base.error,
        code,
        message,
        context: {
          ...base.error.context,
          ...(typeof apiCode === "number" ? { apiCode } : {}),
          ...(typeof details === "object" && details !== null ? { details } : {}),
        },
      },
      requestId: this.readString(exceptionResponse, "requestId") ?? base.requestId,
    };
  }

  private handleGenericError(error: Error, requestMetadata: StandardErrorMetadata): EnhancedErrorResponse {
    return createEnhancedErrorResponse(
      error,
      {
        ...requestMetadata,
        classification: StandardErrorClassification.PROCESSING_ERROR,
        retryable: false,
        severity: ErrorSeverity.HIGH,
        component: "GenericError",
      },
      requestMetadata.correlationId
    );
  }

  private handleUnknownError(error: unknown, requestMetadata: StandardErrorMetadata): EnhancedErrorResponse {
    const errorMessage = typeof error === "string" ? error : "Unknown error occurred";

    return createEnhancedErrorResponse(
      new Error(errorMessage),
      {
        ...requestMetadata,
        classification: StandardErrorClassification.UNKNOWN_ERROR,
        retryable: false,
        severity: ErrorSeverity.CRITICAL,
        component: "UnknownError",
      },
      requestMetadata.correlationId
    );
  }

  private extractRequestMetadata(request: Request): StandardErrorMetadata {
    return {
      classification: StandardErrorClassification.UNKNOWN_ERROR,
      retryable: false,
      severity: ErrorSeverity.MEDIUM,
      component: "HttpFilter",
      correlationId: request.get("X-Request-ID") ?? request.get("X-Correlation-ID") ?? uuidv4(),
      additionalContext: {
        method: request.method,
        path: request.path,
      },
    };
  }

  private readString(source: object, key: string): string | undefined {
    const value: unknown = Reflect.get(source, key);
    return typeof value === "string" ? value : undefined;
  }

  private readMessage(source: object): string | undefined {
    const value: unknown = Reflect.get(source, "message");
    if (typeof value === "string") {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map(item => String(item)).join("; ");
    }
    return undefined;
  }

  private classifyHttpStatus(status: HttpStatus): StandardErrorClassification {
    switch (status) {
      case HttpStatus.UNAUTHORIZED:
        return StandardErrorClassification.AUTHENTICATION_ERROR;
      case HttpStatus.FORBIDDEN:
        return StandardErrorClassification.AUTHORIZATION_ERROR;
      case HttpStatus.NOT_FOUND:
        return StandardErrorClassification.NOT_FOUND_ERROR;
      case HttpStatus.BAD_REQUEST:
      case HttpStatus.UNPROCESSABLE_ENTITY:
        return StandardErrorClassification.VALIDATION_ERROR;
      case HttpStatus.TOO_MANY_REQUESTS:
        return StandardErrorClassification.RATE_LIMIT_ERROR;
      case HttpStatus.REQUEST_TIMEOUT:
        return StandardErrorClassification.TIMEOUT_ERROR;
      case HttpStatus.SERVICE_UNAVAILABLE:
        return StandardErrorClassification.SERVICE_UNAVAILABLE_ERROR;
      default:
        return status >= 500 ? StandardErrorClassification.PROCESSING_ERROR : StandardErrorClassification.UNKNOWN_ERROR;
    }
  }

  private getSeverityForStatus(status: HttpStatus): ErrorSeverity {
    if (status >= 500) {
      return ErrorSeverity.CRITICAL;
    }
    if (status >= 400) {
      return ErrorSeverity.MEDIUM;
    }
    return ErrorSeverity.LOW;
  }

  private isStatusRetryable(status: HttpStatus): boolean {
    return (
      status === HttpStatus.REQUEST_TIMEOUT ||
      status === HttpStatus.TOO_MANY_REQUESTS ||
      status === HttpStatus.SERVICE_UNAVAILABLE
    );
  }

  private calculateRetryAfter(status: HttpStatus): number {
    switch (status) {
      case HttpStatus.TOO_MANY_REQUESTS:
        return 60000;
      case HttpStatus.SERVICE_UNAVAILABLE:
        return 30000;
      default:
        return 5000;
    }
  }

  private ensureStandardizedResponse(
    response: EnhancedErrorResponse,
    status: HttpStatus,
    request: Request
  ): EnhancedErrorResponse {
    return {
      ...response,
      error: {
        ...response.error,
        context: {
          ...response.error.context,
          httpStatus: status,
          path: request.path,
          method: request.method,
        },
      },
    };
  }

  private logError(
    exception: unknown,
    errorResponse: EnhancedErrorResponse,
    request: Request,
    status: HttpStatus
  ): void {
    const message = `${request.method} ${request.path} - ${status} - ${errorResponse.error.message}`;
    const logContext = {
      requestId: errorResponse.requestId,
      code: errorResponse.error.code,
      retryable: errorResponse.retryable,
      severity: errorResponse.error.severity,
    };

    if (status >= 500) {
      this.logger.error(message, exception instanceof Error ? exception.stack : undefined, logContext);
    } else if (status >= 400) {
      this.logger.warn(message, logContext);
    } else {
      this.logger.log(message, logContext);
    }
  }
}
