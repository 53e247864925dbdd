// backend/services/shared/src/app/createServiceApp.ts
/**
 * Purpose:
 * - Assemble the standard service stack:
 *   http logger (request id) → health → body parsers → routes → 404 → problem.
 *
 * Notes:
 * - Routes are one-liners binding controllers: router.get("/", routeTo(C, "index")).
 */

import express, { type Express, type Router } from "express";
import { makeHttpLogger } from "../middleware/httpLogger";
import { notFound, problem } from "../middleware/problem";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "widget"). Used in logs and health output. */
  serviceName: string;
  /** API base path (e.g., "/api"). */
  apiPrefix: string;
  mountRoutes: (router: Router) => void;
  /** Extra middleware run before routes (auth, current-user resolution). */
  before?: express.RequestHandler[];
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, apiPrefix, mountRoutes, before = [] } = opts;

  const app = express();

  app.use(makeHttpLogger(serviceName));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: serviceName, ts: new Date().toISOString() });
  });

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));
  for (const mw of before) app.use(mw);

  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  app.use(notFound);
  app.use(problem);

  return app;
}
