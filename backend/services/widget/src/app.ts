// backend/services/widget/src/app.ts
/**
 * Purpose:
 * - Assemble the widget service on the shared builder:
 *   httpLogger → health → parsers → repo/current user → routes → 404 → problem.
 */

import type { Express, Router } from "express";
import { createServiceApp } from "@render-with/shared";
import { resolveCurrentUser } from "./middleware/currentUser";
import { provideWidgetRepo } from "./middleware/provideWidgetRepo";
import { WidgetRepo } from "./repo/widgetRepo";
import adminWidgetRoutes from "./routes/adminWidgetRoutes";
import widgetRoutes from "./routes/widgetRoutes";

export type CreateAppOptions = {
  repo?: WidgetRepo;
  defaultPerPage?: number;
  serviceName?: string;
};

function mountRoutes(api: Router): void {
  api.use("/widgets", widgetRoutes);
  api.use("/admin/widgets", adminWidgetRoutes);
}

export function createApp(opts: CreateAppOptions = {}): Express {
  const repo = opts.repo ?? WidgetRepo.seeded();
  return createServiceApp({
    serviceName: opts.serviceName ?? "widget",
    apiPrefix: "/api",
    before: [provideWidgetRepo(repo, opts.defaultPerPage ?? 10), resolveCurrentUser],
    mountRoutes,
  });
}
