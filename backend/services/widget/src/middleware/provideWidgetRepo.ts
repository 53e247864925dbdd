// backend/services/widget/src/middleware/provideWidgetRepo.ts
import type { RequestHandler } from "express";
import type { WidgetRepo } from "../repo/widgetRepo";

/** Exposes the store and paging default to controllers via res.locals. */
export function provideWidgetRepo(
  repo: WidgetRepo,
  defaultPerPage: number
): RequestHandler {
  return (_req, res, next) => {
    res.locals.widgetRepo = repo;
    res.locals.defaultPerPage = defaultPerPage;
    next();
  };
}
