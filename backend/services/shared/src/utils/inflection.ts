// backend/services/shared/src/utils/inflection.ts
/**
 * Naive English inflection for resource → serializer naming.
 * Good enough for conventional REST resource names; irregular plurals
 * should register their serializer under an explicit name instead.
 */

export function singularize(word: string): string {
  const w = word.trim();
  if (/[^aeiou]ies$/i.test(w)) return w.slice(0, -3) + "y";
  if (/(ss|x|z|ch|sh)es$/i.test(w)) return w.slice(0, -2);
  if (/ss$/i.test(w)) return w;
  if (/s$/i.test(w)) return w.slice(0, -1);
  return w;
}

/** "line_items" | "line-items" → "LineItems" */
export function camelize(word: string): string {
  return word
    .trim()
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/** "LineItemsController" → "line_items" */
export function underscore(word: string): string {
  return word
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z\d])([A-Z])/g, "$1_$2")
    .replace(/-/g, "_")
    .toLowerCase();
}
