import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config({ path: process.env.DASHBOARD_ENV_FILE ?? ".env" });

import helmet from "helmet";
import { NestFactory } from "@nestjs/core";
import type { INestApplication } from "@nestjs/common";
import { ValidationPipe } from "@nestjs/common";
import { DocumentBuilder, SwaggerDocumentOptions, SwaggerModule } from "@nestjs/swagger";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";
import { enabledLogLevels } from "@/common/types/logging";
import { ConfigService } from "@/config/config.service";
import { ENV, ENV_HELPERS } from "@/config/environment.constants";
import { AppModule } from "@/app.module";

let app: INestApplication | null = null;
const logger = new FilteredLogger("Bootstrap");

async function bootstrap(): Promise<void> {
  try {
    const appCreationStart = performance.now();
    app = await NestFactory.create(AppModule, {
      logger: enabledLogLevels(ENV.LOGGING.LOG_LEVEL),
      abortOnError: false,
    });
    logger.log(`NestJS application created in ${(performance.now() - appCreationStart).toFixed(2)}ms`);
    logger.log(`Log level configured: ${ENV.LOGGING.LOG_LEVEL}`);

    reportConfiguration(app.get(ConfigService));

    app.enableCors({
      origin: process.env.CORS_ORIGIN || true,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With"],
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
      })
    );

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
        disableErrorMessages: ENV_HELPERS.isProduction(),
      })
    );
    app.useGlobalFilters(new HttpExceptionFilter());

    const basePath = ENV.APPLICATION.BASE_PATH;
    setupSwaggerDocumentation(app, basePath);
    app.setGlobalPrefix(basePath);

    setupGracefulShutdown();

    const port = ENV.APPLICATION.PORT;
    await app.listen(port, "0.0.0.0");
    logger.log(`HTTP server is now listening on port ${port}`);
  } catch (error) {
    const errObj = error instanceof Error ? error : new Error(String(error));
    logger.error("Application startup failed:", errObj.stack, errObj.message);

    if (app) {
      try {
        await app.close();
        logger.log("Application cleanup completed during startup failure");
      } catch (closeError) {
        const closeErrObj = closeError instanceof Error ? closeError : new Error(String(closeError));
        logger.error("Application cleanup failed:", closeErrObj.stack, closeErrObj.message);
      }
    }

    process.exit(1);
  }
}

function reportConfiguration(config: ConfigService): void {
  const status = config.getConfigStatus();
  logger.log(`Configuration sources: ${status.sources.join(" -> ")}`);

  for (const warning of config.validateConfiguration()) {
    logger.warn(warning);
  }
}

function setupSwaggerDocumentation(application: INestApplication, basePath: string): void {
  const config = new DocumentBuilder()
    .setTitle("Kiosk Dashboard Data API")
    .setDescription(
      "Cached, tagged results for the kiosk's data sources (bitcoin network stats, weather, calendar) " +
        "with a background refresh loop keeping them warm."
    )
    .setVersion("1.0.0")
    .addTag("Sources", "Per-source results, cache info and manual refresh")
    .addTag("System Health", "Scheduler state and per-source status")
    .addTag("Configuration", "Configuration status, warnings and masked sections")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(application, config, options);
  SwaggerModule.setup(`${basePath}/api-doc`, application, document);
  logger.log("API documentation configured");
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (isShuttingDown) {
      logger.log(`${reason} during shutdown, ignoring...`);
      return;
    }
    isShuttingDown = true;
    logger.log(`${reason}, starting graceful shutdown...`);

    gracefulShutdown()
      .then(() => process.exit(exitCode))
      .catch((error: unknown) => {
        logger.error("Error during shutdown:", String(error));
        process.exit(1);
      });
  };

  for (const signal of ["SIGTERM", "SIGINT", "SIGUSR2"]) {
    process.on(signal, () => shutdown(`Received ${signal}`, 0));
  }

  process.on("uncaughtException", error => {
    logger.error("Uncaught Exception:", error.stack, error.message);
    shutdown("Uncaught exception", 1);
  });

  process.on("unhandledRejection", reason => {
    logger.error(`Unhandled Rejection: ${String(reason)}`);
    shutdown("Unhandled rejection", 1);
  });
}

async function gracefulShutdown(): Promise<void> {
  if (!app) {
    logger.log("No application instance to shutdown");
    return;
  }

  const timeoutMs = ENV.TIMEOUTS.GRACEFUL_SHUTDOWN_MS;
  const shutdownTimeout = setTimeout(() => {
    logger.error(`Shutdown timeout reached after ${timeoutMs}ms, forcing exit`);
    process.exit(1);
  }, timeoutMs);

  const shutdownStartTime = Date.now();

  try {
    // Triggers onModuleDestroy, which stops the refresh loop
    await app.close();
    app = null;
    logger.log(`Graceful shutdown completed in ${Date.now() - shutdownStartTime}ms`);
  } finally {
    clearTimeout(shutdownTimeout);
  }
}

void bootstrap();
