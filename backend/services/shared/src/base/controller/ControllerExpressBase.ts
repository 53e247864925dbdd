// backend/services/shared/src/base/controller/ControllerExpressBase.ts
/**
 * Purpose:
 * - Express-flavored RespondableController:
 *   - action name comes from the route binding (routeTo)
 *   - params = query string + route params (route params win)
 *   - current user from res.locals.currentUser (set by auth middleware)
 *   - emit() writes res.status(..).json(..)
 *
 * Notes:
 * - This class must remain an adapter; rendering logic lives in
 *   RespondableController.
 */

import type { Request, RequestHandler, Response } from "express";
import type { ActionName } from "../../respond/actionResolver";
import { RespondableController } from "../../respond/RespondableController";
import {
  statusCodeOf,
  type EmitOptions,
  type RenderedResponse,
  type RequestParams,
} from "../../respond/responseTypes";

export abstract class ControllerExpressBase extends RespondableController {
  constructor(
    protected readonly req: Request,
    protected readonly res: Response,
    private readonly action: ActionName
  ) {
    super();
  }

  public actionName(): ActionName {
    return this.action;
  }

  public params(): RequestParams {
    const out: RequestParams = {};
    for (const [key, raw] of Object.entries(this.req.query)) {
      if (typeof raw === "string") out[key] = raw;
      else if (Array.isArray(raw) && typeof raw[0] === "string") out[key] = raw[0];
    }
    for (const [key, value] of Object.entries(this.req.params)) {
      out[key] = value;
    }
    return out;
  }

  public override currentUser(): unknown {
    const user: unknown = this.res.locals.currentUser;
    return user ?? undefined;
  }

  public emit(payload: unknown, options: EmitOptions = {}): RenderedResponse {
    const status = statusCodeOf(options.status);
    this.res.status(status).json(payload);
    return { status, body: payload };
  }
}

export type ExpressControllerCtor<T extends ControllerExpressBase> = new (
  req: Request,
  res: Response,
  action: ActionName
) => T;

/** Zero-argument methods of T, i.e. the candidates for a routed action. */
export type ActionMethod<T> = {
  [K in keyof T]: T[K] extends () => unknown ? K : never;
}[keyof T] &
  string;

/**
 * Express handler: build a controller for `action` and run its method of the
 * same name. Thrown errors go to next() (problem middleware).
 */
export function routeTo<T extends ControllerExpressBase>(
  Controller: ExpressControllerCtor<T>,
  action: ActionMethod<T>
): RequestHandler {
  return (req, res, next) => {
    try {
      const controller = new Controller(req, res, action);
      const method: unknown = Reflect.get(controller, action);
      if (typeof method !== "function") {
        throw new TypeError(`${Controller.name} has no action method '${action}'`);
      }
      method.call(controller);
    } catch (err) {
      next(err);
    }
  };
}
