// backend/services/widget/src/config.ts

/**
 * Config:
 * - No dotenv loading here (bootstrap.ts loads env).
 * - WIDGET_PORT is required; fail fast on anything missing/invalid.
 * - Logging vars come from the shared config (LOG_LEVEL, SERVICE_NAME).
 */

import { z } from "zod";
import { ConfigError, loadSharedConfig } from "@render-with/shared";

const zWidgetEnv = z.object({
  WIDGET_PORT: z.coerce.number().int().min(0).max(65535),
  WIDGET_DEFAULT_PER_PAGE: z.coerce.number().int().min(1).max(100).default(10),
});

export type WidgetConfig = {
  readonly serviceName: string;
  readonly port: number;
  readonly defaultPerPage: number;
};

export function loadWidgetConfig(
  env: NodeJS.ProcessEnv = process.env
): WidgetConfig {
  const shared = loadSharedConfig(env);
  const parsed = zWidgetEnv.safeParse({
    WIDGET_PORT: env.WIDGET_PORT?.trim() || undefined,
    WIDGET_DEFAULT_PER_PAGE: env.WIDGET_DEFAULT_PER_PAGE?.trim() || undefined,
  });
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error);
  }
  return {
    serviceName: shared.serviceName,
    port: parsed.data.WIDGET_PORT,
    defaultPerPage: parsed.data.WIDGET_DEFAULT_PER_PAGE,
  };
}
