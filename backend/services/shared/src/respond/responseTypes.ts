// backend/services/shared/src/respond/responseTypes.ts
/**
 * Shared shapes for handlers, render results and render options.
 */

import type { ResponderClass } from "../responder/ResponderBase";
import type {
  SerializationContext,
  SerializerClass,
} from "../serializer/serializerTypes";
import type { ActionName } from "./actionResolver";
import type { RespondableController } from "./RespondableController";

export const HttpStatus = Object.freeze({
  ok: 200,
  created: 201,
  badRequest: 400,
  unprocessableEntity: 422,
  internalServerError: 500,
  notImplemented: 501,
});

export type HttpStatusName = keyof typeof HttpStatus;

export function statusCodeOf(status?: HttpStatusName | number): number {
  if (status === undefined) return HttpStatus.ok;
  return typeof status === "number" ? status : HttpStatus[status];
}

/** What every handler and responder action returns. */
export interface RenderedResponse {
  readonly status: number;
  readonly body: unknown;
}

export function isRenderedResponse(value: unknown): value is RenderedResponse {
  return (
    value !== null &&
    typeof value === "object" &&
    typeof Reflect.get(value, "status") === "number" &&
    "body" in value
  );
}

export interface EmitOptions {
  status?: HttpStatusName | number;
}

/**
 * A registered response handler. Runs with the controller as `this`.
 */
export type ResponseHandler<C extends RespondableController = RespondableController> =
  (
    this: C,
    record: unknown,
    serializer: SerializerClass,
    context: SerializationContext
  ) => RenderedResponse;

/** Read-only snapshot handed to CRUD context functions. */
export interface ResponseScope {
  readonly action: ActionName;
  readonly controllerName: string;
  readonly params: Readonly<RequestParams>;
  readonly currentUser: unknown;
  readonly record: unknown;
  readonly context: Readonly<SerializationContext>;
}

export type ContextFn = (scope: ResponseScope) => unknown;

export type RequestParams = Record<string, string | undefined>;

export interface RenderWithOptions {
  action?: ActionName;
  context?: SerializationContext;
  serializer?: SerializerClass;
  responder?: ResponderClass;
}

export interface CrudHandlerOptions {
  listActions?: readonly ActionName[];
  showActions?: readonly ActionName[];
  collectionContext?: ContextFn;
  itemContext?: ContextFn;
}

export interface RestHandlerOptions {
  namespace?: string;
  actions?: readonly ActionName[];
  context?: SerializationContext;
}
