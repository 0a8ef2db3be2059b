import { Injectable, CanActivate, ExecutionContext, Logger } from "@nestjs/common";
import type { Request, Response } from "express";

import { ErrorResponseBuilder } from "../errors/error-response.builder";
import { ClientIdentificationUtils } from "../utils/client-identification.utils";
import { RateLimiterService } from "./rate-limiter.service";

@Injectable()
export class RateLimitGuard implements CanActivate {
  private readonly logger = new Logger(RateLimitGuard.name);

  constructor(private readonly rateLimiter: RateLimiterService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();

    const clientInfo = ClientIdentificationUtils.getClientInfo(request);
    const { maxRequests, windowMs } = this.rateLimiter.getRateLimitConfig();
    const now = Date.now();

    const rateLimitInfo = this.rateLimiter.checkRateLimit(clientInfo.id, now);

    response.setHeader("X-RateLimit-Limit", maxRequests);
    response.setHeader("X-RateLimit-Remaining", rateLimitInfo.remainingPoints);
    response.setHeader("X-RateLimit-Reset", new Date(now + rateLimitInfo.msBeforeNext).toISOString());

    if (rateLimitInfo.isBlocked) {
      this.rateLimiter.recordRequest(clientInfo.id, false, now);

      const retryAfterSeconds = Math.ceil(rateLimitInfo.msBeforeNext / 1000);
      response.setHeader("Retry-After", retryAfterSeconds);

      const requestId = ErrorResponseBuilder.generateRequestId();
      this.logger.warn(`Rate limit exceeded for client ${clientInfo.sanitized}`, {
        requestId,
        method: request.method,
        url: request.url,
        totalHitsInWindow: rateLimitInfo.totalHitsInWindow,
        limit: maxRequests,
      });

      throw ErrorResponseBuilder.createRateLimitError(requestId, {
        limit: maxRequests,
        windowMs,
        retryAfterSeconds,
        clientId: clientInfo.sanitized,
      });
    }

    const updated = this.rateLimiter.recordRequest(clientInfo.id, true, now);
    response.setHeader("X-RateLimit-Remaining", updated.remainingPoints);

    if (updated.totalHitsInWindow > maxRequests * 0.8) {
      this.logger.log(`High request volume from client ${clientInfo.sanitized}`, {
        totalHitsInWindow: updated.totalHitsInWindow,
        limit: maxRequests,
      });
    }

    return true;
  }
}
