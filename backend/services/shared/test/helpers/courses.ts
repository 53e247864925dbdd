// backend/services/shared/test/helpers/courses.ts
/**
 * In-process controller + serializer fixtures. emit() records instead of
 * writing to a socket, so renderWith() results can be asserted directly.
 */

import type { ActionName } from "../../src/respond/actionResolver";
import { RespondableController } from "../../src/respond/RespondableController";
import {
  statusCodeOf,
  type EmitOptions,
  type RenderedResponse,
  type RequestParams,
} from "../../src/respond/responseTypes";
import type { PersistableRecord } from "../../src/record/recordTypes";
import { SerializerBase } from "../../src/serializer/SerializerBase";
import { SerializerRegistry } from "../../src/serializer/SerializerRegistry";

export class TestController extends RespondableController {
  public readonly emitted: RenderedResponse[] = [];

  constructor(
    private readonly action: ActionName = "index",
    private readonly requestParams: RequestParams = {},
    private readonly user?: unknown
  ) {
    super();
  }

  public actionName(): ActionName {
    return this.action;
  }

  public params(): RequestParams {
    return this.requestParams;
  }

  public override currentUser(): unknown {
    return this.user;
  }

  public emit(payload: unknown, options: EmitOptions = {}): RenderedResponse {
    const out = { status: statusCodeOf(options.status), body: payload };
    this.emitted.push(out);
    return out;
  }
}

/** { id } plus the effective view when one is set. */
export class CourseSerializer extends SerializerBase {
  protected accept(resource: unknown): unknown {
    return resource;
  }

  public override toHash(): Record<string, unknown> {
    const out: Record<string, unknown> = { id: idOf(this.resource) };
    if (this.view !== undefined) out.view = this.view;
    return out;
  }
}

export function idOf(value: unknown): unknown {
  return value !== null && typeof value === "object"
    ? Reflect.get(value, "id")
    : value;
}

export const courseSerializers = new SerializerRegistry().register(CourseSerializer);

/** Tests subclass this per case so class-level registries never leak. */
export class CoursesController extends TestController {
  public override controllerName(): string {
    return "courses";
  }
}
CoursesController.useSerializers(courseSerializers);

export class FakeRecord implements PersistableRecord {
  constructor(
    public readonly id: number,
    private readonly succeeds = true,
    private readonly errors: readonly string[] = []
  ) {}

  public save(): boolean {
    return this.succeeds;
  }

  public delete(): boolean {
    return this.succeeds;
  }

  public validationErrors(): readonly string[] {
    return this.succeeds ? [] : this.errors;
  }
}

/** Paginated collection without perPage/limitValue. */
export class BarePage implements Iterable<unknown> {
  public readonly currentPage = 1;
  public readonly totalPages = 1;
  public readonly totalCount = 2;

  constructor(private readonly items: readonly unknown[]) {}

  public [Symbol.iterator](): Iterator<unknown> {
    return this.items[Symbol.iterator]();
  }
}
