import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import { NestFactory } from "@nestjs/core";
import type { INestApplication } from "@nestjs/common";
import { DocumentBuilder, SwaggerDocumentOptions, SwaggerModule } from "@nestjs/swagger";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { EnhancedLoggerService } from "@/common/logging/enhanced-logger.service";
import { enabledLogLevels } from "@/common/types/logging";
import { AppModule } from "@/app.module";
import { configureApplication } from "@/app.setup";
import { ConfigService } from "@/config/config.service";
import { ENV, ENV_HELPERS } from "@/config/environment.constants";

let app: INestApplication | null = null;
let logger: FilteredLogger | null = null;

async function bootstrap(): Promise<void> {
  const operationId = `bootstrap_${Date.now()}`;
  logger = new FilteredLogger("Bootstrap");
  const enhancedLogger = new EnhancedLoggerService("Bootstrap");
  enhancedLogger.startPerformanceTimer(operationId, "application_bootstrap", "Bootstrap");

  try {
    app = await NestFactory.create(AppModule, {
      logger: enabledLogLevels(ENV.LOGGING.LOG_LEVEL),
      abortOnError: false,
    });

    validateEnvironment(app.get(ConfigService), enhancedLogger);

    enhancedLogger.logCriticalOperation("application_startup", "Bootstrap", {
      nodeVersion: process.version,
      platform: process.platform,
      pid: process.pid,
      environment: ENV.APPLICATION.NODE_ENV,
      logLevel: ENV.LOGGING.LOG_LEVEL,
    });

    configureApplication(app);
    setupSwaggerDocumentation(app, ENV.APPLICATION.BASE_PATH);
    setupGracefulShutdown();

    const port = ENV.APPLICATION.PORT;
    try {
      await app.listen(port, "0.0.0.0");
    } catch (error) {
      const errObj = error instanceof Error ? error : new Error(String(error));
      if (errObj.message.includes("EADDRINUSE")) {
        enhancedLogger.error(errObj, {
          component: "Bootstrap",
          operation: "server_startup",
          severity: "critical",
          metadata: { port, suggestion: "Port is already in use. Stop the other instance or set APP_PORT." },
        });
      }
      throw errObj;
    }

    enhancedLogger.logCriticalOperation("http_server_started", "Bootstrap", {
      port,
      host: "0.0.0.0",
      basePath: ENV.APPLICATION.BASE_PATH,
    });
    enhancedLogger.endPerformanceTimer(operationId, true, { port });
  } catch (error) {
    const errObj = error instanceof Error ? error : new Error(String(error));
    enhancedLogger.error(errObj, {
      component: "Bootstrap",
      operation: "application_startup",
      severity: "critical",
      metadata: { phase: "bootstrap", environment: ENV.APPLICATION.NODE_ENV },
    });
    enhancedLogger.endPerformanceTimer(operationId, false, { error: errObj.message });

    if (app) {
      try {
        await app.close();
      } catch (closeError) {
        logger?.error("Application cleanup failed:", String(closeError));
      }
    }
    process.exit(1);
  }
}

/**
 * Errors stop the process; warnings are logged and startup continues
 */
function validateEnvironment(configService: ConfigService, enhancedLogger: EnhancedLoggerService): void {
  const result = configService.validateEnvironment();
  for (const warning of result.warnings) {
    enhancedLogger.warn(warning, { component: "Bootstrap", operation: "validate_environment" });
  }
  if (!result.isValid) {
    throw new Error(`Invalid environment: ${result.errors.join("; ")}`);
  }
  logger?.log("Environment validation passed");
}

function setupSwaggerDocumentation(application: INestApplication, basePath: string): void {
  if (ENV_HELPERS.isProduction() && !ENV.APPLICATION.ENABLE_API_DOCS) {
    return;
  }

  const config = new DocumentBuilder()
    .setTitle("Price Oracle Aggregator API")
    .setDescription(
      "Collects price submissions from authorized reporters for BTC, ETH and SOL and serves " +
        "volume-weighted, volatility-normalized prices with slippage checks."
    )
    .setVersion("1.0.0")
    .addTag("Prices", "Price submission, aggregated reads, history and slippage checks")
    .addTag("Administration", "Reporter authorization, oracle parameters and the administrator role")
    .addTag("System Health", "Liveness, readiness and detailed health")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(application, config, options);
  SwaggerModule.setup(`${basePath}/api-doc`, application, document);
  logger?.log("API documentation configured");
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (isShuttingDown) {
      logger?.log(`${reason} during shutdown, ignoring...`);
      return;
    }
    isShuttingDown = true;
    logger?.log(`${reason}, starting graceful shutdown...`);

    try {
      await gracefulShutdown();
      process.exit(exitCode);
    } catch (error) {
      logger?.error(`Error during shutdown after ${reason}:`, String(error));
      process.exit(1);
    }
  };

  for (const signal of ["SIGTERM", "SIGINT", "SIGUSR2"]) {
    process.on(signal, () => void shutdown(`Received ${signal}`, 0));
  }

  process.on("uncaughtException", error => {
    logger?.error("Uncaught Exception:", error.stack, error.message);
    void shutdown("Uncaught exception", 1);
  });

  process.on("unhandledRejection", reason => {
    logger?.error(`Unhandled Rejection: ${String(reason)}`);
    void shutdown("Unhandled rejection", 1);
  });
}

async function gracefulShutdown(): Promise<void> {
  if (!app) {
    logger?.log("No application instance to shutdown");
    return;
  }

  const timeoutMs = ENV.TIMEOUTS.GRACEFUL_SHUTDOWN_MS;
  const shutdownTimeout = setTimeout(() => {
    logger?.error(`Shutdown timeout reached after ${timeoutMs}ms, forcing exit`);
    process.exit(1);
  }, timeoutMs);

  const shutdownStartTime = Date.now();
  // Triggers onModuleDestroy on every service
  await app.close();
  app = null;
  clearTimeout(shutdownTimeout);

  logger?.log(`Graceful shutdown completed in ${Date.now() - shutdownStartTime}ms`);
  await new Promise(resolve => setTimeout(resolve, ENV.TIMEOUTS.CLEANUP_DELAY_MS));
}

void bootstrap();
