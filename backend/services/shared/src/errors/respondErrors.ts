// backend/services/shared/src/errors/respondErrors.ts
/**
 * Purpose:
 * - Error taxonomy for the rendering layer. Every class carries a stable
 *   `code` so the problem middleware and logs can key on it.
 *
 * Invariants:
 * - Only MissingResponseHandlerError is recovered by renderWith(); the rest
 *   propagate to the host framework.
 * - Validation failures are not errors here; they render as 422 envelopes.
 */

import type { ZodError } from "zod";

export abstract class RespondError extends Error {
  public abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No handler is registered under respond_for_<action>. */
export class MissingResponseHandlerError extends RespondError {
  public readonly code = "RESPONSE_HANDLER_MISSING";

  constructor(
    public readonly action: string,
    public readonly handlerName: string
  ) {
    super(`No response handler '${handlerName}' for action '${action}'`);
  }
}

/** The conventional serializer name does not resolve to a registered class. */
export class SerializerResolutionError extends RespondError {
  public readonly code = "SERIALIZER_UNRESOLVED";

  constructor(
    public readonly serializerName: string,
    detail?: string
  ) {
    super(
      detail
        ? `Cannot resolve serializer '${serializerName}': ${detail}`
        : `Cannot resolve serializer '${serializerName}'`
    );
  }
}

export class ResponderNotImplementedError extends RespondError {
  public readonly code = "RESPONDER_NOT_IMPLEMENTED";

  constructor(responderName: string, method = "render") {
    super(`${responderName} must implement #${method}`);
  }
}

export class SerializerNotImplementedError extends RespondError {
  public readonly code = "SERIALIZER_NOT_IMPLEMENTED";

  constructor(serializerName: string, method = "toHash") {
    super(`${serializerName} must implement #${method}`);
  }
}

/** A serializer was handed a resource of the wrong shape. */
export class SerializerResourceError extends RespondError {
  public readonly code = "SERIALIZER_RESOURCE_INVALID";

  constructor(
    public readonly serializerName: string,
    detail: string
  ) {
    super(`${serializerName} cannot serialize ${detail}`);
  }
}

/** A built-in handler got a record without the capability it needs. */
export class RecordCapabilityError extends RespondError {
  public readonly code = "RECORD_CAPABILITY_MISSING";

  constructor(
    public readonly action: string,
    public readonly capability: "collection" | "persistable"
  ) {
    super(`Action '${action}' requires a ${capability} record`);
  }
}

export class ConfigError extends RespondError {
  public readonly code = "CONFIG_INVALID";

  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = []
  ) {
    super(message);
  }

  static fromZod(error: ZodError): ConfigError {
    const issues = error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    }));
    const summary = issues.map((i) => `${i.path}: ${i.message}`).join("; ");
    return new ConfigError(`Invalid configuration: ${summary}`, issues);
  }
}
