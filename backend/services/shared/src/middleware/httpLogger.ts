// backend/services/shared/src/middleware/httpLogger.ts
/**
 * Purpose:
 * - Structured access logs via pino-http, sharing the root pino instance so
 *   level and base fields match component logs.
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Reuse an inbound x-request-id when present; mint a UUID otherwise, and
 *   always echo it back.
 * - Health probes are not logged.
 */

import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import pinoHttp from "pino-http";
import { getRootPino } from "../logger/Logger";

const QUIET_PATHS = new Set(["/health", "/health/live", "/health/ready", "/favicon.ico"]);

function headerValue(value: string | string[] | undefined): string | undefined {
  const v = Array.isArray(value) ? value[0] : value;
  return v && v.trim() ? v.trim() : undefined;
}

export function makeHttpLogger(serviceName: string) {
  const logger = getRootPino().child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const id =
        headerValue(req.headers["x-request-id"]) ??
        headerValue(req.headers["x-correlation-id"]) ??
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      if (res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },
  });
}
