// backend/services/shared/src/respond/actionResolver.ts
/**
 * Purpose:
 * - Map an inbound action name to the action whose handler should run.
 *
 * Precedence (fixed, no other fallback):
 *   1) a handler registered for the action itself
 *   2) a declared alias whose target has a handler
 *   3) the action itself; the caller observes the missing handler
 *
 * Notes:
 * - Aliases are followed one hop only. a→b, b→a resolves a to b when b has a
 *   handler and to a otherwise; it never loops.
 * - There is no implicit action → CRUD mapping. Callers opt in with an alias
 *   or a handler definition.
 */

export type ActionName = string;
export type AliasMap = Readonly<Record<ActionName, ActionName>>;

const HANDLER_PREFIX = "respond_for_";

/** Diagnostic name of the handler for an action: respond_for_<action>. */
export function handlerMethodName(action: ActionName): string {
  return `${HANDLER_PREFIX}${action}`;
}

export function resolveHandlerName(
  action: ActionName,
  aliases: AliasMap,
  handlerExists: (action: ActionName) => boolean
): ActionName {
  if (handlerExists(action)) return action;

  const mapped = Object.prototype.hasOwnProperty.call(aliases, action)
    ? aliases[action]
    : undefined;
  if (mapped !== undefined && handlerExists(mapped)) return mapped;

  return action;
}
