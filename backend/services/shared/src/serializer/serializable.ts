// backend/services/shared/src/serializer/serializable.ts
import type {
  SerializationContext,
  SerializerClass,
} from "./serializerTypes";

export function serializeItem<T>(
  item: T,
  serializer: SerializerClass<T>,
  context: SerializationContext = {}
): Record<string, unknown> {
  return new serializer(item, context).toHash();
}

/** Order-preserving sequential map over the collection. */
export function serializeCollection<T>(
  collection: Iterable<T>,
  serializer: SerializerClass<T>,
  context: SerializationContext = {}
): Array<Record<string, unknown>> {
  return Array.from(collection, (item) =>
    serializeItem(item, serializer, context)
  );
}
