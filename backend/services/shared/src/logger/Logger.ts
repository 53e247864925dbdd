// backend/services/shared/src/logger/Logger.ts
/**
 * Purpose:
 * - Single shared logging API with contextual .bind().
 * - Overloaded methods allow:
 *     log.info("msg")            OR  log.info({ctx}, "msg")
 * - Backed by pino; the root logger is created lazily from shared config
 *   (LOG_LEVEL, SERVICE_NAME) unless a root is installed with setRootLogger().
 *
 * Notes:
 * - Responders, controllers and middleware never call pino directly.
 * - pino-http (middleware/httpLogger.ts) reuses getRootPino() so access logs
 *   and component logs share level and base fields.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { loadSharedConfig } from "../config/sharedConfig";

type Json = Record<string, unknown>;

/** Public interface for bound logger handles (no private members). */
export interface IBoundLogger {
  bind(ctx: Json): IBoundLogger;

  info(msg: string): void;
  info(obj: Json, msg?: string): void;

  debug(msg: string): void;
  debug(obj: Json, msg?: string): void;

  warn(msg: string): void;
  warn(obj: Json, msg?: string): void;

  error(msg: string): void;
  error(obj: Json, msg?: string): void;

  serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  };
}

// ────────────────────────────────────────────────────────────────────────────
// Root logger
// ────────────────────────────────────────────────────────────────────────────

let ROOT: PinoLogger | null = null;

/** Install a root pino instance (tests, or a service with its own transport). */
export function setRootLogger(logger: PinoLogger): void {
  ROOT = logger;
}

/** Drop the cached root so the next getLogger() re-reads config. */
export function resetRootLogger(): void {
  ROOT = null;
}

export function getRootPino(): PinoLogger {
  if (!ROOT) {
    const cfg = loadSharedConfig();
    ROOT = pino({
      level: cfg.logLevel,
      base: { service: cfg.serviceName },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        remove: true,
        paths: ["req.headers.authorization", "req.headers.cookie"],
      },
    });
  }
  return ROOT;
}

export function getLogger(initialCtx: Json = {}): IBoundLogger {
  return new BoundLogger(initialCtx);
}

// ────────────────────────────────────────────────────────────────────────────
// Bound logger
// ────────────────────────────────────────────────────────────────────────────

class BoundLogger implements IBoundLogger {
  // Child loggers are created on first write, after the root exists.
  #child: PinoLogger | null = null;

  constructor(private readonly ctx: Json = {}) {}

  public bind(ctx: Json): IBoundLogger {
    return new BoundLogger({ ...this.ctx, ...ctx });
  }

  private target(): PinoLogger {
    if (!this.#child) this.#child = getRootPino().child(this.ctx);
    return this.#child;
  }

  public info(arg: string | Json, msg?: string): void {
    if (typeof arg === "string") this.target().info(arg);
    else this.target().info(arg, msg);
  }

  public debug(arg: string | Json, msg?: string): void {
    if (typeof arg === "string") this.target().debug(arg);
    else this.target().debug(arg, msg);
  }

  public warn(arg: string | Json, msg?: string): void {
    if (typeof arg === "string") this.target().warn(arg);
    else this.target().warn(arg, msg);
  }

  public error(arg: string | Json, msg?: string): void {
    if (typeof arg === "string") this.target().error(arg);
    else this.target().error(arg, msg);
  }

  public serializeError(err: unknown): {
    name?: string;
    message: string;
    stack?: string;
  } {
    if (err instanceof Error) {
      return { name: err.name, message: err.message, stack: err.stack };
    }
    return { message: String(err ?? "unknown error") };
  }
}
