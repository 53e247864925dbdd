// backend/services/widget/src/middleware/currentUser.ts
/**
 * Purpose:
 * - Resolve the end user for the request and expose it as
 *   res.locals.currentUser (read by ControllerExpressBase.currentUser()).
 *
 * Notes:
 * - Authentication happens upstream; this service trusts the x-user-id header
 *   the edge forwards. A missing or malformed header means anonymous.
 */

import type { RequestHandler } from "express";
import { z } from "zod";

export const USER_HEADER = "x-user-id";

const zUserId = z.string().trim().regex(/^[A-Za-z0-9_-]{1,64}$/);

export type WidgetUser = { readonly id: string };

export function isWidgetUser(value: unknown): value is WidgetUser {
  return (
    value !== null &&
    typeof value === "object" &&
    typeof Reflect.get(value, "id") === "string"
  );
}

export const resolveCurrentUser: RequestHandler = (req, res, next) => {
  const parsed = zUserId.safeParse(req.get(USER_HEADER));
  if (parsed.success) {
    const user: WidgetUser = { id: parsed.data };
    res.locals.currentUser = user;
  }
  next();
};
