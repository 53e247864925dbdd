// backend/services/shared/src/record/recordTypes.ts
/**
 * Purpose:
 * - Explicit capability checks for records handed to renderWith().
 * - Records are never typed by the framework; the checks below decide at
 *   the boundary what a handler may do with them.
 */

/** Records the create/update/destroy defaults can act on. */
export interface PersistableRecord {
  save(): boolean;
  delete(): boolean;
  /** Human-readable validation messages; empty when valid. */
  validationErrors(): readonly string[];
}

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** List-like and not itself a key/value map. */
export function isCollection(value: unknown): value is Iterable<unknown> {
  if (Array.isArray(value)) return true;
  if (value === null || typeof value !== "object") return false;
  if (value instanceof Map || isPlainObject(value)) return false;
  return typeof Reflect.get(value, Symbol.iterator) === "function";
}

export function isPersistable(value: unknown): value is PersistableRecord {
  if (value === null || typeof value !== "object") return false;
  return (
    typeof Reflect.get(value, "save") === "function" &&
    typeof Reflect.get(value, "delete") === "function" &&
    typeof Reflect.get(value, "validationErrors") === "function"
  );
}
