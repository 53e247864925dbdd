// backend/services/shared/src/serializer/SerializerBase.ts
/**
 * Purpose:
 * - Optional base class for model serializers.
 * - Exposes the wrapped resource, the context, and the context-derived
 *   accessors serializers usually branch on (currentUser, view).
 *
 * Invariants:
 * - The constructor takes `unknown` so every subclass is a SerializerClass;
 *   accept() narrows the resource once, before toHash() can see it.
 *
 * Example:
 *   class ProductSerializer extends SerializerBase<Product> {
 *     protected accept(resource: unknown): Product {
 *       return resource instanceof Product ? resource : this.reject(resource);
 *     }
 *     toHash() {
 *       return this.view === "minimal"
 *         ? { id: this.resource.id, name: this.resource.name }
 *         : { id: this.resource.id, name: this.resource.name, price: this.resource.price };
 *     }
 *   }
 */

import {
  SerializerNotImplementedError,
  SerializerResourceError,
} from "../errors/respondErrors";
import { isCollection } from "../record/recordTypes";
import type {
  SerializationContext,
  SerializerClass,
  SerializerInstance,
} from "./serializerTypes";

export abstract class SerializerBase<TResource = unknown>
  implements SerializerInstance
{
  protected readonly resource: TResource;

  constructor(
    resource: unknown,
    protected readonly context: SerializationContext = {}
  ) {
    this.resource = this.accept(resource);
  }

  /** Narrow the raw resource; throw (see reject()) when it does not fit. */
  protected abstract accept(resource: unknown): TResource;

  public toHash(): Record<string, unknown> {
    throw new SerializerNotImplementedError(this.constructor.name);
  }

  protected reject(resource: unknown): never {
    const kind = typeof resource;
    const shape =
      resource === null
        ? "null"
        : Array.isArray(resource)
          ? "an array"
          : `${/^[aeiou]/.test(kind) ? "an" : "a"} ${kind}`;
    throw new SerializerResourceError(this.constructor.name, shape);
  }

  protected get currentUser(): unknown {
    return this.context.currentUser;
  }

  protected get view(): string | undefined {
    return this.context.view;
  }

  /** Serialize a nested association with the same context. */
  protected serializeAssociation(
    association: unknown,
    serializer: SerializerClass
  ): Record<string, unknown> | Array<Record<string, unknown>> | null {
    if (association == null) return null;
    if (isCollection(association)) {
      return Array.from(association, (item) =>
        new serializer(item, this.context).toHash()
      );
    }
    return new serializer(association, this.context).toHash();
  }
}
