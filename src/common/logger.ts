import type { FastifyBaseLogger } from "fastify";

// Structural slice of Fastify's pino logger: context object first, message second.
export type LoggerLike = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
