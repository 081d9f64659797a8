/**
 * Server configuration from environment variables.
 *
 *   PORT                         listen port (default: 8080)
 *   HOST                         bind address (default: 0.0.0.0)
 *   CRUNCHER_WORKERS             worker count, clamped to 1-16 (default: 1)
 *   CRUNCHER_SHUTDOWN_GRACE_MS   drain window on shutdown (default: 2000)
 *   CRUNCHER_PHASE               rollout phase reported by /health
 *   LOG_LEVEL                    pino level (default: info)
 */

import { z } from "zod";
import { ConfigError } from "./errors";

export const MAX_WORKERS = 16;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().min(1).default("0.0.0.0"),
  CRUNCHER_WORKERS: z.coerce
    .number()
    .int()
    .default(1)
    .transform((n) => Math.max(1, Math.min(n, MAX_WORKERS))),
  CRUNCHER_SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(2000),
  CRUNCHER_PHASE: z.string().min(1).default("1-skeleton"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export interface ServerConfig {
  port: number;
  host: string;
  workers: number;
  shutdownGraceMs: number;
  phase: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
}

/**
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Empty strings count as unset
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));

  const parsed = envSchema.safeParse(defined);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    workers: vars.CRUNCHER_WORKERS,
    shutdownGraceMs: vars.CRUNCHER_SHUTDOWN_GRACE_MS,
    phase: vars.CRUNCHER_PHASE,
    logLevel: vars.LOG_LEVEL,
  };
}
