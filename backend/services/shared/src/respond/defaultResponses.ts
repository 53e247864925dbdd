// backend/services/shared/src/respond/defaultResponses.ts
/**
 * Purpose:
 * - Built-in handlers for index/show/create/update/destroy. They are
 *   registered on RespondableController itself, so every controller resolves
 *   them and any subclass may shadow them.
 * - The 501 answer a generated REST handler gives when no handler for its
 *   base action is reachable (only possible outside the five built-ins).
 *
 * Invariants:
 * - Validation failures render 422 { errors }; they never throw.
 * - A record lacking the needed capability throws RecordCapabilityError.
 */

import { RecordCapabilityError } from "../errors/respondErrors";
import { isPaginated, paginationMeta } from "../pagination/pagination";
import {
  isCollection,
  isPersistable,
  type PersistableRecord,
} from "../record/recordTypes";
import type {
  SerializationContext,
  SerializerClass,
} from "../serializer/serializerTypes";
import type { ActionName } from "./actionResolver";
import type { InvokeHandler } from "./responseDefinitions";
import { HttpStatus, type RenderedResponse } from "./responseTypes";
import type { RespondableController } from "./RespondableController";

export const RECORD_DELETED_MESSAGE = "Record deleted successfully";

export type CollectionBody = {
  data: Array<Record<string, unknown>>;
  meta?: Record<string, unknown>;
};

/** Throws RecordCapabilityError unless `record` is list-like. */
export function requireCollection(
  action: ActionName,
  record: unknown
): Iterable<unknown> {
  if (!isCollection(record)) {
    throw new RecordCapabilityError(action, "collection");
  }
  return record;
}

function requirePersistable(
  action: ActionName,
  record: unknown
): PersistableRecord {
  if (!isPersistable(record)) {
    throw new RecordCapabilityError(action, "persistable");
  }
  return record;
}

function renderValidationErrors(
  controller: RespondableController,
  record: PersistableRecord
): RenderedResponse {
  return controller.emit(
    { errors: [...record.validationErrors()] },
    { status: "unprocessableEntity" }
  );
}

// ────────────────────────────────────────────────────────────────────────────
// Built-ins
// ────────────────────────────────────────────────────────────────────────────

/** { data } plus pagination meta when detected, else context.meta when set. */
export function respondForIndex(
  controller: RespondableController,
  record: unknown,
  serializer: SerializerClass,
  context: SerializationContext
): RenderedResponse {
  const collection = requireCollection("index", record);
  const body: CollectionBody = {
    data: controller.serializeCollection(collection, serializer, context),
  };

  if (isPaginated(record)) {
    body.meta = paginationMeta(record, context);
  } else if (context.meta) {
    body.meta = context.meta;
  }

  return controller.emit(body);
}

export function respondForShow(
  controller: RespondableController,
  record: unknown,
  serializer: SerializerClass,
  context: SerializationContext
): RenderedResponse {
  return controller.emit(controller.serializeItem(record, serializer, context));
}

export function respondForCreate(
  controller: RespondableController,
  record: unknown,
  serializer: SerializerClass,
  context: SerializationContext
): RenderedResponse {
  const persistable = requirePersistable("create", record);
  if (persistable.save()) {
    return controller.emit(
      controller.serializeItem(persistable, serializer, context),
      { status: "created" }
    );
  }
  return renderValidationErrors(controller, persistable);
}

export function respondForUpdate(
  controller: RespondableController,
  record: unknown,
  serializer: SerializerClass,
  context: SerializationContext
): RenderedResponse {
  const persistable = requirePersistable("update", record);
  if (persistable.validationErrors().length === 0) {
    return controller.emit(
      controller.serializeItem(persistable, serializer, context),
      { status: "ok" }
    );
  }
  return renderValidationErrors(controller, persistable);
}

export function respondForDestroy(
  controller: RespondableController,
  record: unknown
): RenderedResponse {
  const persistable = requirePersistable("destroy", record);
  if (persistable.delete()) {
    return controller.emit(
      { message: RECORD_DELETED_MESSAGE },
      { status: "ok" }
    );
  }
  return renderValidationErrors(controller, persistable);
}

export const BUILT_IN_RESPONSES: Readonly<Record<ActionName, InvokeHandler>> =
  Object.freeze({
    index: respondForIndex,
    show: respondForShow,
    create: respondForCreate,
    update: respondForUpdate,
    destroy: respondForDestroy,
  });

export const REST_ACTIONS: readonly ActionName[] = Object.freeze([
  "index",
  "show",
  "create",
  "update",
  "destroy",
]);

// ────────────────────────────────────────────────────────────────────────────
// Generated REST handler fallback
// ────────────────────────────────────────────────────────────────────────────

/** Answers a generated handler whose base action has no handler anywhere. */
export function respondNotImplemented(baseAction: ActionName): InvokeHandler {
  return (controller) =>
    controller.emit(
      { error: `No default behavior for action ${baseAction}` },
      { status: HttpStatus.notImplemented }
    );
}
