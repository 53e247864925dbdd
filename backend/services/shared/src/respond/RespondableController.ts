// backend/services/shared/src/respond/RespondableController.ts
/**
 * Purpose:
 * - Abstract controller base that turns (record, action) into a rendered
 *   JSON response.
 * - Static configuration API (class setup time):
 *     mapAction / mapActions          → action aliases
 *     defineHandler / defineHandlers  → custom handlers
 *     defineCrudHandlers              → list/show handlers with dynamic context
 *     generateRestHandlers            → namespaced REST handler sets
 *     useSerializers                  → serializer registry for conventions
 * - renderWith() is the single per-request entry point.
 *
 * Invariants:
 * - Handlers live in per-class registries (responseDefinitions.ts); there is
 *   no reflective method lookup.
 * - Built-in index/show/create/update/destroy are always resolvable.
 * - Only a missing respond_for_* handler is recovered (400 envelope);
 *   every other error propagates untouched.
 *
 * Notes:
 * - Configure after the class body:
 *     class WidgetsController extends ControllerExpressBase { ... }
 *     WidgetsController.mapAction("featured", { to: "index" });
 */

import {
  MissingResponseHandlerError,
  SerializerResolutionError,
} from "../errors/respondErrors";
import { getLogger, type IBoundLogger } from "../logger/Logger";
import { isPlainObject } from "../record/recordTypes";
import type { ResponderClass } from "../responder/ResponderBase";
import {
  serializeCollection,
  serializeItem,
} from "../serializer/serializable";
import { SerializerRegistry } from "../serializer/SerializerRegistry";
import type {
  SerializationContext,
  SerializerClass,
} from "../serializer/serializerTypes";
import { underscore } from "../utils/inflection";
import {
  handlerMethodName,
  resolveHandlerName,
  type ActionName,
} from "./actionResolver";
import {
  BUILT_IN_RESPONSES,
  REST_ACTIONS,
  respondNotImplemented,
  requireCollection,
} from "./defaultResponses";
import { unsupportedActionBody } from "./invalidAction";
import {
  addAliases,
  addHandler,
  collectAliases,
  collectDefinitions,
  findHandler,
  findSerializerRegistry,
  findShadowedHandler,
  setSerializerRegistry,
  type HandlerDefinition,
  type HandlerKind,
} from "./responseDefinitions";
import {
  isRenderedResponse,
  type ContextFn,
  type CrudHandlerOptions,
  type EmitOptions,
  type RenderWithOptions,
  type RenderedResponse,
  type RequestParams,
  type ResponseHandler,
  type ResponseScope,
  type RestHandlerOptions,
} from "./responseTypes";

export type ControllerClass<
  T extends RespondableController = RespondableController,
> = abstract new (...args: never[]) => T;

function defineOn<T extends RespondableController>(
  cls: ControllerClass<T>,
  action: ActionName,
  kind: HandlerKind,
  body: ResponseHandler<T>
): HandlerDefinition {
  return addHandler(cls, action, kind, (controller, record, serializer, context) => {
    if (!(controller instanceof cls)) {
      throw new TypeError(
        `${handlerMethodName(action)} cannot run on ${controller.constructor.name}`
      );
    }
    return body.call(controller, record, serializer, context);
  });
}

function scopeFor(
  controller: RespondableController,
  action: ActionName,
  record: unknown,
  context: SerializationContext
): ResponseScope {
  return Object.freeze({
    action,
    controllerName: controller.controllerName(),
    params: Object.freeze({ ...controller.params() }),
    currentUser: controller.currentUser(),
    record,
    context: Object.freeze({ ...context }),
  });
}

/** Copy of `context` with the context function's result merged in, if it is a map. */
function enhanceContext(
  controller: RespondableController,
  action: ActionName,
  record: unknown,
  context: SerializationContext,
  fn: ContextFn | undefined
): SerializationContext {
  const enhanced: SerializationContext = { ...context };
  if (!fn) return enhanced;
  const extra = fn(scopeFor(controller, action, record, context));
  if (isPlainObject(extra)) Object.assign(enhanced, extra);
  return enhanced;
}

export abstract class RespondableController {
  protected readonly log: IBoundLogger;

  constructor() {
    this.log = getLogger({
      component: "RespondableController",
      controller: this.constructor.name,
    });
  }

  // ───────────────────────────────────────────
  // Host collaborator (implemented per framework)
  // ───────────────────────────────────────────

  /** Name of the action the current request is for. */
  public abstract actionName(): ActionName;

  public abstract params(): RequestParams;

  /** Raw JSON emission primitive. */
  public abstract emit(payload: unknown, options?: EmitOptions): RenderedResponse;

  public currentUser(): unknown {
    return undefined;
  }

  /** "LineItemsController" → "line_items". Override when class names are minified. */
  public controllerName(): string {
    return underscore(this.constructor.name.replace(/Controller$/, ""));
  }

  // ───────────────────────────────────────────
  // Configuration API (class setup time)
  // ───────────────────────────────────────────

  public static mapAction(
    this: ControllerClass,
    action: ActionName,
    options: { to: ActionName }
  ): void {
    addAliases(this, { [action]: options.to });
  }

  public static mapActions(
    this: ControllerClass,
    mapping: Readonly<Record<ActionName, ActionName>>
  ): void {
    addAliases(this, mapping);
  }

  public static defineHandler<T extends RespondableController>(
    this: ControllerClass<T>,
    action: ActionName,
    body: ResponseHandler<T>
  ): void {
    defineOn(this, action, "custom", body);
  }

  public static defineHandlers<T extends RespondableController>(
    this: ControllerClass<T>,
    actions: readonly ActionName[],
    body: ResponseHandler<T>
  ): void {
    for (const action of actions) defineOn(this, action, "custom", body);
  }

  /**
   * List actions render { data: [...] }, show actions render { data: {...} }.
   * Context functions get an explicit ResponseScope; a plain-object result is
   * merged into a copy of the request context.
   */
  public static defineCrudHandlers(
    this: ControllerClass,
    options: CrudHandlerOptions
  ): void {
    const { collectionContext, itemContext } = options;

    for (const action of options.listActions ?? []) {
      addHandler(this, action, "crud-list", (controller, record, serializer, context) => {
        const enhanced = enhanceContext(controller, action, record, context, collectionContext);
        return controller.emit({
          data: controller.serializeCollection(
            requireCollection(action, record),
            serializer,
            enhanced
          ),
        });
      });
    }

    for (const action of options.showActions ?? []) {
      addHandler(this, action, "crud-show", (controller, record, serializer, context) => {
        const enhanced = enhanceContext(controller, action, record, context, itemContext);
        return controller.emit({
          data: controller.serializeItem(record, serializer, enhanced),
        });
      });
    }
  }

  /**
   * Installs "<namespace>_<action>" (or "<action>") per base action. Each one
   * layers `context` under the request context and delegates to the handler
   * for the base action, or answers 501 when there is none.
   *
   * Namespaced handlers look the base action up from the request's class.
   * Un-namespaced ones replace the base action on this class, so they look
   * it up from the parent: the handler they shadow.
   */
  public static generateRestHandlers(
    this: ControllerClass,
    options: RestHandlerOptions = {}
  ): void {
    const namespace = options.namespace?.trim();
    const baseContext = options.context ?? {};

    for (const baseAction of options.actions ?? REST_ACTIONS) {
      const action = namespace ? `${namespace}_${baseAction}` : baseAction;
      const fallback = respondNotImplemented(baseAction);

      addHandler(this, action, "rest", (controller, record, serializer, context) => {
        const merged: SerializationContext = { ...baseContext, ...context };
        const base = namespace
          ? findHandler(controller.constructor, baseAction)
          : findShadowedHandler(this, baseAction);
        if (base) return base.invoke(controller, record, serializer, merged);
        return fallback(controller, record, serializer, merged);
      });
    }
  }

  public static useSerializers(
    this: ControllerClass,
    registry: SerializerRegistry
  ): void {
    setSerializerRegistry(this, registry);
  }

  /** Merged alias map visible to this class. */
  public static actionMappings(
    this: ControllerClass
  ): Readonly<Record<ActionName, ActionName>> {
    return collectAliases(this);
  }

  /** Handlers defined through the configuration API (built-ins excluded). */
  public static responseDefinitions(
    this: ControllerClass
  ): ReadonlyMap<ActionName, HandlerDefinition> {
    return collectDefinitions(this);
  }

  // ───────────────────────────────────────────
  // Serialization helpers (handlers + responders)
  // ───────────────────────────────────────────

  public serializeItem(
    item: unknown,
    serializer: SerializerClass,
    context: SerializationContext = {}
  ): Record<string, unknown> {
    return serializeItem(item, serializer, context);
  }

  public serializeCollection(
    collection: Iterable<unknown>,
    serializer: SerializerClass,
    context: SerializationContext = {}
  ): Array<Record<string, unknown>> {
    return serializeCollection(collection, serializer, context);
  }

  /** Identity contribution merged into every context. */
  public serializationUser(): SerializationContext {
    const user = this.currentUser();
    return user === undefined ? {} : { currentUser: user };
  }

  // ───────────────────────────────────────────
  // Dispatch
  // ───────────────────────────────────────────

  public renderWith(
    record: unknown,
    options: RenderWithOptions = {}
  ): RenderedResponse {
    const action = options.action ?? this.actionName();

    try {
      const context = this.buildContext(options.context);
      const serializer = options.serializer ?? this.resolveSerializer();

      if (options.responder) {
        return this.renderWithResponder(
          options.responder,
          options.action,
          record,
          serializer,
          context
        );
      }

      const target = resolveHandlerName(
        action,
        collectAliases(this.constructor),
        (candidate) => this.hasResponseHandler(candidate)
      );

      this.log.debug(
        { event: "render_with", action, handler: handlerMethodName(target) },
        "RespondableController.renderWith"
      );

      return this.respondFor(target, record, serializer, context);
    } catch (err) {
      if (err instanceof MissingResponseHandlerError) {
        return this.renderInvalidAction(action);
      }
      throw err;
    }
  }

  public hasResponseHandler(action: ActionName): boolean {
    return findHandler(this.constructor, action) !== undefined;
  }

  /** Invoke the handler registered for `action`; throws if there is none. */
  public respondFor(
    action: ActionName,
    record: unknown,
    serializer: SerializerClass,
    context: SerializationContext
  ): RenderedResponse {
    const def = findHandler(this.constructor, action);
    if (!def) {
      throw new MissingResponseHandlerError(action, handlerMethodName(action));
    }
    return def.invoke(this, record, serializer, context);
  }

  protected buildContext(
    overrides: SerializationContext | undefined
  ): SerializationContext {
    const context: SerializationContext = {
      ...(overrides ?? {}),
      ...this.serializationUser(),
    };
    // An explicit view wins over the request parameter.
    if (context.view == null) {
      const view = this.params().view;
      if (view) context.view = view;
    }
    return context;
  }

  protected resolveSerializer(): SerializerClass {
    const registry = findSerializerRegistry(this.constructor);
    if (!registry) {
      throw new SerializerResolutionError(
        SerializerRegistry.serializerNameFor(this.controllerName()),
        `no serializer registry configured on ${this.constructor.name}`
      );
    }
    return registry.resolveFor(this.controllerName());
  }

  protected renderWithResponder(
    Responder: ResponderClass,
    action: ActionName | undefined,
    record: unknown,
    serializer: SerializerClass,
    context: SerializationContext
  ): RenderedResponse {
    const responder = new Responder(this, record, serializer, context);

    if (action !== undefined && Responder.actions.includes(action)) {
      const method: unknown = Reflect.get(responder, action);
      if (typeof method === "function") {
        const out: unknown = method.call(responder);
        if (!isRenderedResponse(out)) {
          throw new TypeError(
            `${Responder.name}#${action} did not return a rendered response`
          );
        }
        return out;
      }
    }

    return responder.render();
  }

  protected renderInvalidAction(action: ActionName): RenderedResponse {
    const controller = this.controllerName();
    this.log.warn(
      { event: "action_not_supported", action, controller },
      "RespondableController — no response handler for action"
    );
    return this.emit(unsupportedActionBody(action, controller), {
      status: "badRequest",
    });
  }
}

for (const [action, invoke] of Object.entries(BUILT_IN_RESPONSES)) {
  addHandler(RespondableController, action, "builtin", invoke);
}
