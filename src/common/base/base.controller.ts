import { v4 as uuidv4 } from "uuid";
import { HttpException } from "@nestjs/common";
import { MonitoringService } from "./composed.service";
import { ErrorResponseBuilder } from "../errors/error-response.builder";
import { createSuccessResponse } from "../utils/http-response.utils";
import type { ApiResponse } from "../types/http/http.types";
import type { OracleResult } from "../types/oracle";
import { ENV } from "@/config/environment.constants";

interface ControllerOperationOptions {
  requestId?: string;
  body?: unknown;
  performanceThreshold?: number;
}

/** Request body fields never written to logs in full */
const REDACTED_FIELDS = new Set(["proof"]);

/**
 * Base controller class consolidates common controller patterns: request ids,
 * request and response logging, the success envelope, and turning oracle
 * results into HTTP errors.
 */
export abstract class BaseController extends MonitoringService {
  protected readonly controllerName: string;

  constructor() {
    super();
    this.controllerName = this.constructor.name;
  }

  public generateRequestId(): string {
    return uuidv4();
  }

  /**
   * Run a synchronous operation with request logging and timing, and wrap its value in
   * the success envelope. Exceptions propagate to the global filter.
   */
  protected handleControllerOperation<T>(
    operation: (requestId: string) => T,
    operationName: string,
    method: string,
    url: string,
    options: ControllerOperationOptions = {}
  ): ApiResponse<T> {
    const {
      requestId = this.generateRequestId(),
      body,
      performanceThreshold = ENV.PERFORMANCE.SLOW_RESPONSE_THRESHOLD_MS,
    } = options;
    const startTime = performance.now();

    this.logApiRequest(method, url, body, requestId);

    try {
      const data = operation(requestId);
      const responseTime = performance.now() - startTime;
      const response = createSuccessResponse(data, { requestId, responseTime });

      this.incrementCounter(`${operationName}_success`);
      this.logPerformance(operationName, responseTime, performanceThreshold);
      this.logApiResponse(method, url, 200, responseTime, this.calculateResponseSize(response), requestId);
      return response;
    } catch (error) {
      const responseTime = performance.now() - startTime;
      const status = this.statusOf(error);

      this.incrementCounter(`${operationName}_error`);
      this.logApiResponse(
        method,
        url,
        status,
        responseTime,
        0,
        requestId,
        error instanceof Error ? error.message : String(error)
      );
      throw error;
    }
  }

  /**
   * Value of a successful oracle result; a failure becomes the HttpException mapped to its kind
   */
  protected unwrapResult<T>(result: OracleResult<T>, requestId?: string, details?: Record<string, unknown>): T {
    if (!result.ok) {
      throw ErrorResponseBuilder.createOracleError(result.error, requestId, details);
    }
    return result.value;
  }

  protected logApiRequest(method: string, url: string, body?: unknown, requestId?: string): void {
    const sanitizedBody = this.sanitizeRequestBody(body);
    this.logger.log(`API Request: ${method} ${url}`, {
      requestId,
      method,
      url,
      body: sanitizedBody,
      timestamp: Date.now(),
    });
  }

  protected logApiResponse(
    method: string,
    url: string,
    statusCode: number,
    responseTime: number,
    responseSize: number,
    requestId?: string,
    errorMessage?: string
  ): void {
    const message = `API Response: ${method} ${url} - ${statusCode}`;
    const context = {
      requestId,
      method,
      url,
      statusCode,
      responseTime: Math.round(responseTime),
      responseSize,
      timestamp: Date.now(),
      error: errorMessage,
    };

    if (statusCode >= 500) {
      this.logger.error(message, context);
    } else if (statusCode >= 400) {
      this.logger.warn(message, context);
    } else {
      this.logger.log(message, context);
    }
  }

  /**
   * Copy of a request body fit for logs: proofs are reduced to their length
   */
  protected sanitizeRequestBody(body: unknown): unknown {
    if (typeof body !== "object" || body === null) {
      return body;
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(body)) {
      sanitized[key] =
        REDACTED_FIELDS.has(key) && typeof value === "string" ? `[${value.length} chars redacted]` : value;
    }
    return sanitized;
  }

  protected calculateResponseSize(response: unknown): number {
    try {
      return JSON.stringify(response).length;
    } catch {
      return 0;
    }
  }

  private statusOf(error: unknown): number {
    return error instanceof HttpException ? error.getStatus() : 500;
  }
}
