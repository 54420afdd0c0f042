import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { SwaggerOptions } from "@fastify/swagger";
import type { FastifySwaggerUiOptions } from "@fastify/swagger-ui";
import { ZodError } from "zod";
import { AppError } from "./common/errors";
import { openapiDocument } from "./common/openapi";
import { type ContainerOptions, createContainer } from "./di";
import { registerAccountsRoutes } from "./modules/accounts/routes";
import { registerLedgerRoutes } from "./modules/ledger/routes";
import { type AppConfig, config } from "./config";
import { getPool } from "./infra/postgres/pool";

export type BuildAppOptions = Omit<ContainerOptions, "logger"> & {
  logLevel?: AppConfig["LOG_LEVEL"];
};

const AMOUNT_FIELD = "amountCents";

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const logLevel = options.logLevel ?? config.LOG_LEVEL;
  const app = Fastify({
    logger: logLevel === "silent" ? false : { level: logLevel },
    bodyLimit: config.BODY_LIMIT_BYTES,
    maxParamLength: config.MAX_PARAM_LENGTH,
    connectionTimeout: config.REQUEST_TIMEOUT_MS,
    requestTimeout: config.REQUEST_TIMEOUT_MS,
    // Amounts must arrive as JSON numbers; zod coerces the querystring itself.
    ajv: { customOptions: { coerceTypes: false } }
  });
  const container = createContainer({ ...options, logger: app.log });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("x-request-id", request.id);
  });

  app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW_MS,
    addHeaders: {
      "x-ratelimit-limit": true,
      "x-ratelimit-remaining": true,
      "x-ratelimit-reset": true
    }
  });

  const swaggerOptions: SwaggerOptions = {
    mode: "static",
    specification: {
      document: openapiDocument
    }
  };

  const swaggerUiOptions: FastifySwaggerUiOptions = {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      url: "/docs/json"
    }
  };

  app.register(swagger, swaggerOptions);
  app.register(swaggerUi, swaggerUiOptions);

  app.get("/health", async () => ({ status: "ok" }));

  app.get("/health/db", async () => {
    if (config.REPO_PROVIDER !== "postgres") {
      return { status: "skipped" };
    }
    try {
      const pool = getPool();
      const start = Date.now();
      await pool.query("SELECT 1");
      return {
        status: "ok",
        latency: Date.now() - start,
        pool: {
          totalCount: pool.totalCount,
          idleCount: pool.idleCount,
          waitingCount: pool.waitingCount
        }
      };
    } catch (error) {
      app.log.error({ err: error }, "Database health check failed");
      return { status: "down" };
    }
  });

  registerAccountsRoutes(app, container.accountsController);
  registerLedgerRoutes(app, container.ledgerController);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      if (error.status >= 500) {
        request.log.error({ err: error }, "Ledger storage failure");
      }
      return reply
        .status(error.status)
        .send({ error: error.code, message: error.message });
    }

    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => ({
        path: issue.path.join("."),
        code: issue.code,
        message: issue.message
      }));

      if (error.issues.some((issue) => issue.path.includes(AMOUNT_FIELD))) {
        return reply.status(400).send({
          error: "INVALID_AMOUNT",
          message: "Amount must be a positive whole number of cents",
          details: issues
        });
      }

      return reply.status(400).send({
        error: "INVALID_REQUEST",
        message: "Validation failed",
        details: issues
      });
    }

    if (error.validation) {
      const onAmount = error.validation.some((issue) =>
        issue.instancePath.endsWith(`/${AMOUNT_FIELD}`)
      );
      return reply.status(400).send({
        error: onAmount ? "INVALID_AMOUNT" : "INVALID_REQUEST",
        message: error.message
      });
    }

    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.code ?? "REQUEST_ERROR",
        message: error.message
      });
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: "INTERNAL_SERVER_ERROR",
      message: "Unexpected error"
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`
    });
  });

  app.addHook("onClose", async () => {
    await container.store.close();
  });

  return app;
}
