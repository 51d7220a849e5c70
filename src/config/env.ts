import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import type { ConfigError } from "../domain/models/errors.ts";
import { type LogLevel, logLevelSchema } from "./logger.ts";

const envSchema = z.object({
  CONTENT_API_KEY: z.string().min(1).optional(),
  CONTENT_API_ENDPOINT: z.string().url().optional(),
  LOG_LEVEL: z.string().transform((value) => value.toLowerCase()).pipe(logLevelSchema).optional(),
});

/**
 * Settings the example CLI reads from the environment. The library itself never does.
 */
export interface Env {
  apiKey?: string;
  endpoint?: string;
  logLevel?: LogLevel;
}

export function loadEnv(
  source: Record<string, string | undefined> = process.env,
): Result<Env, ConfigError> {
  // Unset and empty variables are treated alike
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    return err({
      type: "invalidConfig",
      message: "Invalid environment configuration",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  return ok({
    apiKey: parsed.data.CONTENT_API_KEY,
    endpoint: parsed.data.CONTENT_API_ENDPOINT,
    logLevel: parsed.data.LOG_LEVEL,
  });
}
