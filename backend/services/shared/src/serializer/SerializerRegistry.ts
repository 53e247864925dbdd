// backend/services/shared/src/serializer/SerializerRegistry.ts
/**
 * Purpose:
 * - Typed name → serializer lookup used when renderWith() is not handed an
 *   explicit serializer.
 * - Convention: controller "line_items" → "LineItemSerializer".
 *
 * Invariants:
 * - A miss is a configuration bug: resolve*() throws SerializerResolutionError.
 */

import { SerializerResolutionError } from "../errors/respondErrors";
import { camelize, singularize } from "../utils/inflection";
import type { SerializerClass } from "./serializerTypes";

export class SerializerRegistry {
  #byName = new Map<string, SerializerClass>();

  /** Register under an explicit name, or the class name when omitted. */
  public register(serializer: SerializerClass, name?: string): this {
    const key = (name ?? serializer.name).trim();
    if (!key) {
      throw new SerializerResolutionError(
        "(anonymous)",
        "anonymous serializer classes need an explicit name"
      );
    }
    this.#byName.set(key, serializer);
    return this;
  }

  public has(name: string): boolean {
    return this.#byName.has(name);
  }

  public resolve(name: string): SerializerClass {
    const found = this.#byName.get(name);
    if (!found) {
      throw new SerializerResolutionError(
        name,
        `registered: [${[...this.#byName.keys()].join(", ")}]`
      );
    }
    return found;
  }

  public resolveFor(resourceName: string): SerializerClass {
    return this.resolve(SerializerRegistry.serializerNameFor(resourceName));
  }

  public static serializerNameFor(resourceName: string): string {
    return `${camelize(singularize(resourceName))}Serializer`;
  }
}
