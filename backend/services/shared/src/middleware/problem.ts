// backend/services/shared/src/middleware/problem.ts
/**
 * Purpose:
 * - Error tail: anything a controller lets propagate (serializer resolution,
 *   responder not implemented, record capability, plain bugs) becomes
 *   Problem+JSON. Errors carrying a 400–599 status keep it; everything else is 500.
 * - notFound: unmatched routes → 404 Problem+JSON.
 */

import { STATUS_CODES } from "node:http";
import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Problem } from "../contracts/responses";
import { RespondError } from "../errors/respondErrors";
import { getLogger } from "../logger/Logger";

const log = getLogger({ component: "problem" });

function statusOf(err: unknown): number {
  if (err !== null && typeof err === "object") {
    const status: unknown = Reflect.get(err, "status");
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

function codeOf(err: unknown): string {
  if (err instanceof RespondError) return err.code;
  if (err !== null && typeof err === "object") {
    const code: unknown = Reflect.get(err, "code");
    if (typeof code === "string" && code) return code;
  }
  return "UNSPECIFIED";
}

function requestIdOf(id: unknown): string | undefined {
  return typeof id === "string" || typeof id === "number" ? String(id) : undefined;
}

export const problem: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status = statusOf(err);
  const requestId = requestIdOf(Reflect.get(req, "id"));
  const body: Problem = {
    type: "about:blank",
    title: STATUS_CODES[status] ?? "Error",
    status,
    code: codeOf(err),
    detail: err instanceof Error ? err.message : "Unhandled error",
    requestId,
  };

  if (status >= 500) {
    log.error(
      { event: "unhandled_error", requestId, status, err: log.serializeError(err) },
      "problem — unhandled error"
    );
  } else {
    log.warn({ event: "client_error", requestId, status, problem: body }, "problem — client error");
  }

  res.status(status).type("application/problem+json").json(body);
};

export const notFound: RequestHandler = (req, res) => {
  res
    .status(404)
    .type("application/problem+json")
    .json({
      type: "about:blank",
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail: `No route for ${req.method} ${req.path}`,
      requestId: requestIdOf(Reflect.get(req, "id")),
    } satisfies Problem);
};
