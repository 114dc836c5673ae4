import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().url().optional(),
  STORAGE: z.enum(["database", "memory"]).optional(),
  JOB_STORE: z.enum(["database", "memory"]).optional(),
  IMPORT_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  IMPORT_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(10),
  IMPORT_WEBHOOK_URL: z.string().url().optional(),
  SUMMARY_INCLUDE_DELETED_EMPLOYEES: booleanFlag.default("true"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface AppConfig {
  nodeEnv: string;
  port: number;
  databaseUrl: string | undefined;
  storage: "database" | "memory";
  jobStore: "database" | "memory";
  importConcurrency: number;
  importRateLimitPerMinute: number;
  importWebhookUrl: string | undefined;
  /** Whether summaries count hours of soft-deleted employees */
  summaryIncludeDeletedEmployees: boolean;
  logLevel: LogLevel;
}

/**
 * Reads configuration from the environment. Storage defaults to the
 * database whenever DATABASE_URL is set, otherwise to memory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const defaultBackend = values.DATABASE_URL ? "database" : "memory";

  if (values.NODE_ENV === "production" && !values.DATABASE_URL) {
    throw new Error("DATABASE_URL environment variable is required in production");
  }

  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    storage: values.STORAGE ?? defaultBackend,
    jobStore: values.JOB_STORE ?? values.STORAGE ?? defaultBackend,
    importConcurrency: values.IMPORT_CONCURRENCY,
    importRateLimitPerMinute: values.IMPORT_RATE_LIMIT_PER_MINUTE,
    importWebhookUrl: values.IMPORT_WEBHOOK_URL,
    summaryIncludeDeletedEmployees: values.SUMMARY_INCLUDE_DELETED_EMPLOYEES,
    logLevel: values.LOG_LEVEL,
  };
}

export const config = loadConfig();
