// backend/services/shared/src/responder/ResponderBase.ts
/**
 * Purpose:
 * - Base class for standalone responders. A responder keeps the response
 *   logic for one or more custom actions out of the controller.
 * - renderWith(record, { responder: X, action: "featured" }) calls
 *   X#featured when "featured" is listed in X.actions, else X#render.
 *
 * Invariants:
 * - Built fresh per dispatch; holds nothing beyond its constructor arguments.
 * - Only names listed in the static `actions` are dispatchable.
 *
 * Example:
 *   class FeaturedResponder extends ResponderBase {
 *     override render() {
 *       return this.renderCollectionWithMeta(undefined, { type: "featured" });
 *     }
 *   }
 */

import { ResponderNotImplementedError } from "../errors/respondErrors";
import {
  isPaginated,
  paginationMeta,
} from "../pagination/pagination";
import { isCollection } from "../record/recordTypes";
import type {
  EmitOptions,
  RenderedResponse,
  RequestParams,
} from "../respond/responseTypes";
import type { RespondableController } from "../respond/RespondableController";
import type {
  SerializationContext,
  SerializerClass,
} from "../serializer/serializerTypes";

export type ResponderClass = {
  new (
    controller: RespondableController,
    record: unknown,
    serializer: SerializerClass,
    context: SerializationContext
  ): ResponderBase;
  readonly actions: readonly string[];
};

export class ResponderBase {
  /** Public action methods renderWith() may dispatch to. */
  public static readonly actions: readonly string[] = [];

  constructor(
    public readonly controller: RespondableController,
    public readonly record: unknown,
    public readonly serializer: SerializerClass,
    public readonly context: SerializationContext = {}
  ) {}

  public render(): RenderedResponse {
    throw new ResponderNotImplementedError(this.constructor.name);
  }

  protected serializeCollection(
    records?: Iterable<unknown>,
    serializer?: SerializerClass,
    context?: SerializationContext
  ): Array<Record<string, unknown>> {
    const target = records ?? this.recordAsCollection();
    return this.controller.serializeCollection(
      target,
      serializer ?? this.serializer,
      context ?? this.context
    );
  }

  protected serializeItem(
    item?: unknown,
    serializer?: SerializerClass,
    context?: SerializationContext
  ): Record<string, unknown> {
    return this.controller.serializeItem(
      item ?? this.record,
      serializer ?? this.serializer,
      context ?? this.context
    );
  }

  protected params(): RequestParams {
    return this.controller.params();
  }

  protected currentUser(): unknown {
    return this.controller.currentUser();
  }

  protected renderJson(data: unknown, options: EmitOptions = {}): RenderedResponse {
    return this.controller.emit(data, options);
  }

  protected isCollection(): boolean {
    return isCollection(this.record);
  }

  protected isSingleItem(): boolean {
    return !this.isCollection();
  }

  protected isPaginated(): boolean {
    return isPaginated(this.record);
  }

  /**
   * { data, meta? }. Pagination meta (with additionalMeta on top) when the
   * records are paginated, else additionalMeta when non-empty, else no meta.
   */
  protected renderCollectionWithMeta(
    records?: Iterable<unknown>,
    additionalMeta: Record<string, unknown> = {}
  ): RenderedResponse {
    const target = records ?? this.recordAsCollection();
    const body: { data: Array<Record<string, unknown>>; meta?: Record<string, unknown> } = {
      data: this.serializeCollection(target),
    };

    if (isPaginated(target)) {
      body.meta = { ...paginationMeta(target, this.context), ...additionalMeta };
    } else if (Object.keys(additionalMeta).length > 0) {
      body.meta = additionalMeta;
    }

    return this.renderJson(body);
  }

  private recordAsCollection(): Iterable<unknown> {
    if (isCollection(this.record)) return this.record;
    return [this.record];
  }
}
