import { z } from "zod";

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default("0.0.0.0"),
    REPO_PROVIDER: z.enum(["memory", "postgres"]).default("memory"),
    DATABASE_URL: z.string().optional(),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
    BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(16_384),
    MAX_PARAM_LENGTH: z.coerce.number().int().positive().default(100),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    DB_POOL_SIZE: z.coerce.number().int().positive().default(10),
    DB_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(2_000),
    RETRY_MAX_ATTEMPTS: z.coerce.number().int().nonnegative().default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().positive().default(25),
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    WELCOME_BONUS_CENTS: z.coerce.number().int().positive().default(100_000),
    ACCOUNT_NUMBER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5)
  })
  .superRefine((value, ctx) => {
    if (value.REPO_PROVIDER === "postgres" && !value.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "DATABASE_URL is required when REPO_PROVIDER=postgres",
        path: ["DATABASE_URL"]
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
