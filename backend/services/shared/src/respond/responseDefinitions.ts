// backend/services/shared/src/respond/responseDefinitions.ts
/**
 * Purpose:
 * - Per-controller-class registries: action aliases, response handlers and
 *   the serializer registry used for convention lookups.
 *
 * Invariants:
 * - Written only at configuration time (class setup), read per request.
 * - Each class owns its entries; lookups walk the class lineage so subclasses
 *   inherit and may override or extend, never mutate, a parent's entries.
 * - Alias registration merges; the last write per key wins.
 */

import type { SerializerRegistry } from "../serializer/SerializerRegistry";
import type {
  SerializationContext,
  SerializerClass,
} from "../serializer/serializerTypes";
import { handlerMethodName, type ActionName } from "./actionResolver";
import type { RenderedResponse } from "./responseTypes";
import type { RespondableController } from "./RespondableController";

export type HandlerKind = "builtin" | "custom" | "crud-list" | "crud-show" | "rest";

export type InvokeHandler = (
  controller: RespondableController,
  record: unknown,
  serializer: SerializerClass,
  context: SerializationContext
) => RenderedResponse;

export interface HandlerDefinition {
  readonly action: ActionName;
  readonly handlerName: string;
  readonly kind: HandlerKind;
  readonly definedOn: string;
  readonly invoke: InvokeHandler;
}

class ResponseDefinitions {
  readonly aliases = new Map<ActionName, ActionName>();
  readonly handlers = new Map<ActionName, HandlerDefinition>();
  serializers: SerializerRegistry | undefined;
}

const REGISTRY = new WeakMap<object, ResponseDefinitions>();

function ownDefinitions(cls: object): ResponseDefinitions {
  let defs = REGISTRY.get(cls);
  if (!defs) {
    defs = new ResponseDefinitions();
    REGISTRY.set(cls, defs);
  }
  return defs;
}

/** Leaf-first list of classes from `cls` up its constructor chain. */
function lineage(cls: object): object[] {
  const out: object[] = [];
  let cur: unknown = cls;
  while (typeof cur === "function" && cur !== Function.prototype) {
    out.push(cur);
    cur = Object.getPrototypeOf(cur);
  }
  return out;
}

function className(cls: object): string {
  const name: unknown = Reflect.get(cls, "name");
  return typeof name === "string" && name ? name : "(anonymous)";
}

// ────────────────────────────────────────────────────────────────────────────
// Writes (configuration time)
// ────────────────────────────────────────────────────────────────────────────

export function addAliases(
  cls: object,
  mapping: Readonly<Record<ActionName, ActionName>>
): void {
  const defs = ownDefinitions(cls);
  for (const [from, to] of Object.entries(mapping)) {
    defs.aliases.set(String(from), String(to));
  }
}

export function addHandler(
  cls: object,
  action: ActionName,
  kind: HandlerKind,
  invoke: InvokeHandler
): HandlerDefinition {
  const def: HandlerDefinition = Object.freeze({
    action,
    handlerName: handlerMethodName(action),
    kind,
    definedOn: className(cls),
    invoke,
  });
  ownDefinitions(cls).handlers.set(action, def);
  return def;
}

export function setSerializerRegistry(
  cls: object,
  registry: SerializerRegistry
): void {
  ownDefinitions(cls).serializers = registry;
}

// ────────────────────────────────────────────────────────────────────────────
// Reads (request time)
// ────────────────────────────────────────────────────────────────────────────

/** Merged alias map; nearer classes override farther ones per key. */
export function collectAliases(cls: object): Record<ActionName, ActionName> {
  const merged: Record<ActionName, ActionName> = {};
  for (const c of lineage(cls).reverse()) {
    const defs = REGISTRY.get(c);
    if (!defs) continue;
    for (const [from, to] of defs.aliases) merged[from] = to;
  }
  return merged;
}

/** Nearest handler for an action, searching from `cls` upward. */
export function findHandler(
  cls: object,
  action: ActionName
): HandlerDefinition | undefined {
  for (const c of lineage(cls)) {
    const def = REGISTRY.get(c)?.handlers.get(action);
    if (def) return def;
  }
  return undefined;
}

/** Nearest handler strictly above `cls`: what a handler on `cls` shadows. */
export function findShadowedHandler(
  cls: object,
  action: ActionName
): HandlerDefinition | undefined {
  const parent: unknown = Object.getPrototypeOf(cls);
  return typeof parent === "function" ? findHandler(parent, action) : undefined;
}

/** Non-builtin definitions visible from `cls`, keyed by action. */
export function collectDefinitions(
  cls: object
): ReadonlyMap<ActionName, HandlerDefinition> {
  const merged = new Map<ActionName, HandlerDefinition>();
  for (const c of lineage(cls).reverse()) {
    const defs = REGISTRY.get(c);
    if (!defs) continue;
    for (const [action, def] of defs.handlers) {
      if (def.kind !== "builtin") merged.set(action, def);
    }
  }
  return merged;
}

export function findSerializerRegistry(
  cls: object
): SerializerRegistry | undefined {
  for (const c of lineage(cls)) {
    const reg = REGISTRY.get(c)?.serializers;
    if (reg) return reg;
  }
  return undefined;
}
