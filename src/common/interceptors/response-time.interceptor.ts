import { Injectable, NestInterceptor, ExecutionContext, CallHandler, HttpException } from "@nestjs/common";
import type { Request, Response } from "express";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { MonitoringService } from "../base/composed.service";
import { ClientIdentificationUtils } from "../utils/client-identification.utils";
import { toError } from "../types/services/mixins";
import { ENV } from "@/config/environment.constants";

/**
 * Stamps X-Response-Time on every response and logs slow or failed calls
 */
@Injectable()
export class ResponseTimeInterceptor extends MonitoringService implements NestInterceptor {
  private readonly slowThresholdMs = ENV.PERFORMANCE.SLOW_RESPONSE_THRESHOLD_MS;

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const startTime = Date.now();
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const { method, url } = request;
    const clientInfo = ClientIdentificationUtils.getClientInfo(request);

    return next.handle().pipe(
      tap({
        next: () => {
          const responseTime = Date.now() - startTime;
          response.setHeader("X-Response-Time", `${responseTime}ms`);
          this.recordMetric("response_time_ms", responseTime);
          this.incrementCounter("requests_completed");

          const logContext = {
            method,
            url,
            statusCode: response.statusCode,
            responseTime,
            clientId: clientInfo.sanitized,
            userAgent: ClientIdentificationUtils.sanitizeUserAgent(request.headers["user-agent"]),
          };

          if (responseTime > this.slowThresholdMs) {
            this.logger.warn(
              `${method} ${url} - ${response.statusCode} - ${responseTime}ms - SLOW RESPONSE`,
              logContext
            );
          } else {
            this.logger.debug(`${method} ${url} - ${response.statusCode} - ${responseTime}ms`, logContext);
          }
        },
        error: (error: unknown) => {
          const responseTime = Date.now() - startTime;
          const statusCode = error instanceof HttpException ? error.getStatus() : 500;
          response.setHeader("X-Response-Time", `${responseTime}ms`);
          this.incrementCounter("requests_failed");

          const message = `${method} ${url} - ${statusCode} - ${responseTime}ms - ERROR: ${toError(error).message}`;
          if (statusCode >= 500) {
            this.logger.error(message, { clientId: clientInfo.sanitized });
          } else {
            this.logger.debug(message, { clientId: clientInfo.sanitized });
          }
        },
      })
    );
  }
}
