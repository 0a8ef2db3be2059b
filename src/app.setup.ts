import helmet from "helmet";
import { v4 as uuidv4 } from "uuid";
import { HttpStatus, ValidationPipe, type INestApplication } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";
import { ResponseTimeInterceptor } from "@/common/interceptors/response-time.interceptor";
import { CALLER_HEADER } from "@/common/utils/client-identification.utils";
import { ErrorSeverity, StandardErrorClassification, type EnhancedErrorResponse } from "@/common/types/error-handling";
import { ENV, ENV_HELPERS } from "@/config/environment.constants";

export const ALLOWED_METHODS = ["GET", "POST", "OPTIONS"];

/**
 * Middleware, pipes, filters and interceptors shared by the server and the HTTP tests.
 * Swagger and the listener stay in main.ts.
 */
export function configureApplication(app: INestApplication): void {
  const origins = ENV.APPLICATION.CORS_ORIGINS;
  app.enableCors({
    origin: origins.length > 0 ? origins : true,
    methods: ALLOWED_METHODS,
    allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "X-Request-ID", CALLER_HEADER],
    exposedHeaders: ["X-RateLimit-Limit", "X-RateLimit-Remaining", "X-RateLimit-Reset", "X-Response-Time"],
    credentials: false,
    maxAge: ENV.APPLICATION.CORS_MAX_AGE,
  });

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'"],
          imgSrc: ["'self'", "data:", "https:"],
        },
      },
      crossOriginEmbedderPolicy: false,
      hsts: { maxAge: 31536000, includeSubDomains: true, preload: true },
    })
  );

  app.use((req: Request, res: Response, next: NextFunction): void => {
    if (!ALLOWED_METHODS.includes(req.method)) {
      rejectRequest(res, HttpStatus.METHOD_NOT_ALLOWED, "METHOD_NOT_ALLOWED", "Method Not Allowed", {
        method: req.method,
        allowedMethods: ALLOWED_METHODS,
      });
      return;
    }
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction): void => {
    if (req.method === "POST") {
      const contentType = req.get("Content-Type");
      if (!contentType?.includes("application/json")) {
        rejectRequest(
          res,
          HttpStatus.UNSUPPORTED_MEDIA_TYPE,
          "UNSUPPORTED_MEDIA_TYPE",
          "Unsupported Media Type. Only application/json is accepted.",
          { method: req.method, contentType: contentType ?? "none", expectedContentType: "application/json" }
        );
        return;
      }
    }
    next();
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      disableErrorMessages: ENV_HELPERS.isProduction(),
    })
  );
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new ResponseTimeInterceptor());

  if (ENV.APPLICATION.BASE_PATH) {
    app.setGlobalPrefix(ENV.APPLICATION.BASE_PATH);
  }
}

function rejectRequest(
  res: Response,
  status: HttpStatus,
  code: string,
  message: string,
  context: Record<string, unknown>
): void {
  const body: EnhancedErrorResponse = {
    success: false,
    error: {
      code,
      message,
      severity: ErrorSeverity.MEDIUM,
      module: "HttpFilter",
      timestamp: Date.now(),
      context: { classification: StandardErrorClassification.VALIDATION_ERROR, httpStatus: status, ...context },
    },
    timestamp: Date.now(),
    requestId: uuidv4(),
    retryable: false,
  };
  res.status(status).json(body);
}
