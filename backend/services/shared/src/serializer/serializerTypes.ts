// backend/services/shared/src/serializer/serializerTypes.ts
/**
 * Purpose:
 * - Serializer contract: construct from (record, context), produce a flat
 *   key/value representation. The rendering layer never looks inside.
 */

/** Per-request metadata threaded from renderWith() into serializers and handlers. */
export interface SerializationContext {
  currentUser?: unknown;
  view?: string;
  perPage?: number;
  meta?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface SerializerInstance {
  toHash(): Record<string, unknown>;
}

export type SerializerClass<TResource = unknown> = new (
  resource: TResource,
  context: SerializationContext
) => SerializerInstance;
