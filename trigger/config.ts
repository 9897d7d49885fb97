import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors";

const MEBIBYTE = 1024 * 1024;

const configSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  TASK_QUEUE_BACKEND: z.enum(["local", "trigger"]).default("local"),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  TASK_RETENTION_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(24 * 60 * 60 * 1000),
  UPLOAD_DIR: z.string().default(join(tmpdir(), "analysis-uploads")),
  UPLOAD_RETENTION_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(60 * 60 * 1000),
  UPLOAD_SWEEP_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(60 * 60 * 1000),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(10 * MEBIBYTE),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  ANTHROPIC_MODEL: z.string().default("claude-3-5-haiku-20241022"),
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
});

export type ServiceConfig = z.infer<typeof configSchema>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServiceConfig {
  const parsed = configSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  return parsed.data;
}

let cachedConfig: ServiceConfig | null = null;

export function getConfig(): ServiceConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }

  return cachedConfig;
}
