// backend/services/shared/src/config/sharedConfig.ts
/**
 * Purpose:
 * - Environment-driven configuration for the shared rendering layer.
 * - Validated with zod; fail fast on anything missing or malformed.
 *
 * Vars:
 * - LOG_LEVEL    (required) fatal | error | warn | info | debug | trace | silent
 * - SERVICE_NAME (optional) stamped on every log line; defaults to "render-with"
 *
 * Notes:
 * - No dotenv here. Entry points load .env files before anything reads config.
 */

import { z } from "zod";
import { ConfigError } from "../errors/respondErrors";

export const zLogLevel = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);
export type LogLevel = z.infer<typeof zLogLevel>;

const zSharedEnv = z.object({
  LOG_LEVEL: zLogLevel,
  SERVICE_NAME: z.string().trim().min(1).default("render-with"),
});

export type SharedConfig = {
  readonly logLevel: LogLevel;
  readonly serviceName: string;
};

export function loadSharedConfig(
  env: NodeJS.ProcessEnv = process.env
): SharedConfig {
  const parsed = zSharedEnv.safeParse({
    LOG_LEVEL: env.LOG_LEVEL?.trim().toLowerCase(),
    SERVICE_NAME: env.SERVICE_NAME,
  });
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error);
  }
  return {
    logLevel: parsed.data.LOG_LEVEL,
    serviceName: parsed.data.SERVICE_NAME,
  };
}
