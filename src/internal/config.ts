import process from "node:process";
import { z } from "zod";

import { createLogger, LOG_LEVELS, type LogLevel, type Logger, type LogSink } from "./logger.js";

export class ConfigError extends Error {
  override name = "ConfigError";
}

export interface RuntimeConfig {
  logLevel: LogLevel;
  /** Request bodies larger than this are rejected by the Node adapter. */
  maxBodyBytes: number;
}

export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

const logLevelSchema = z.enum(LOG_LEVELS);

const envSchema = z.object({
  EXPOSE_RPC_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(logLevelSchema)
    .optional(),
  EXPOSE_RPC_MAX_BODY_BYTES: z
    .string()
    .trim()
    .regex(/^\d+$/, "expected a positive integer")
    .transform((v) => Number(v))
    .pipe(z.number().int().positive())
    .optional()
});

/**
 * Reads configuration from the environment.
 *
 * - `EXPOSE_RPC_LOG_LEVEL`: silent | error | warn | info | debug (default: warn)
 * - `EXPOSE_RPC_MAX_BODY_BYTES`: request body limit (default: 10 MiB)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = envSchema.safeParse({
    EXPOSE_RPC_LOG_LEVEL: env.EXPOSE_RPC_LOG_LEVEL || undefined,
    EXPOSE_RPC_MAX_BODY_BYTES: env.EXPOSE_RPC_MAX_BODY_BYTES || undefined
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") ?? "environment";
    throw new ConfigError(`Invalid ${key}: ${issue?.message ?? "invalid value"}`);
  }
  return {
    logLevel: parsed.data.EXPOSE_RPC_LOG_LEVEL ?? "warn",
    maxBodyBytes: parsed.data.EXPOSE_RPC_MAX_BODY_BYTES ?? DEFAULT_MAX_BODY_BYTES
  };
}

export function loggerFromConfig(config: RuntimeConfig, sink?: LogSink): Logger {
  return createLogger({ level: config.logLevel, sink });
}
