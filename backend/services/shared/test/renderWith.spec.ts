// backend/services/shared/test/renderWith.spec.ts
import { describe, expect, it, vi } from "vitest";
import {
  MissingResponseHandlerError,
  RecordCapabilityError,
  ResponderNotImplementedError,
  SerializerResolutionError,
} from "../src/errors/respondErrors";
import { PaginatedList } from "../src/pagination/pagination";
import { RECORD_DELETED_MESSAGE } from "../src/respond/defaultResponses";
import type { ResponseScope } from "../src/respond/responseTypes";
import { ResponderBase } from "../src/responder/ResponderBase";
import { SerializerRegistry } from "../src/serializer/SerializerRegistry";
import {
  BarePage,
  CourseSerializer,
  CoursesController,
  FakeRecord,
  TestController,
} from "./helpers/courses";

describe("renderWith — index", () => {
  it("adds all four pagination fields for a paginated collection", () => {
    const list = new PaginatedList([{ id: 1 }, { id: 2 }], 2, 2, 5);
    const res = new CoursesController("index").renderWith(list);

    expect(res).toEqual({
      status: 200,
      body: {
        data: [{ id: 1 }, { id: 2 }],
        meta: { currentPage: 2, totalPages: 3, totalCount: 5, perPage: 2 },
      },
    });
  });

  it("omits perPage when the collection does not expose one", () => {
    const res = new CoursesController("index").renderWith(
      new BarePage([{ id: 1 }, { id: 2 }])
    );
    expect(res.body).toEqual({
      data: [{ id: 1 }, { id: 2 }],
      meta: { currentPage: 1, totalPages: 1, totalCount: 2 },
    });
  });

  it("lets context.meta override pagination fields", () => {
    const list = new PaginatedList([{ id: 1 }], 1, 1, 4);
    const res = new CoursesController("index").renderWith(list, {
      context: { meta: { totalCount: 99, extra: true } },
    });
    expect(res.body).toEqual({
      data: [{ id: 1 }],
      meta: { currentPage: 1, totalPages: 4, totalCount: 99, perPage: 1, extra: true },
    });
  });

  it("uses context.meta verbatim for a non-paginated collection", () => {
    const res = new CoursesController("index").renderWith([{ id: 1 }, { id: 2 }], {
      context: { meta: { custom: "data" } },
    });
    expect(res).toEqual({
      status: 200,
      body: { data: [{ id: 1 }, { id: 2 }], meta: { custom: "data" } },
    });
  });

  it("has no meta key without pagination or context.meta", () => {
    const res = new CoursesController("index").renderWith([{ id: 1 }]);
    expect(res.body).toEqual({ data: [{ id: 1 }] });
    expect(res.body).not.toHaveProperty("meta");
  });

  it("rejects a record that is not a collection", () => {
    expect(() => new CoursesController("index").renderWith({ id: 1 })).toThrow(
      RecordCapabilityError
    );
  });
});

describe("renderWith — resolution", () => {
  it("prefers a direct handler over an alias for the same action", () => {
    class DirectFirstController extends CoursesController {}
    DirectFirstController.mapAction("featured", { to: "index" });
    DirectFirstController.defineHandler("featured", function () {
      return this.emit({ direct: true });
    });

    const res = new DirectFirstController("featured").renderWith([{ id: 1 }]);
    expect(res.body).toEqual({ direct: true });
  });

  it("follows an alias when the action has no handler", () => {
    class AliasController extends CoursesController {}
    AliasController.mapAction("catalog", { to: "index" });

    const res = new AliasController("catalog").renderWith([{ id: 1 }]);
    expect(res).toEqual({ status: 200, body: { data: [{ id: 1 }] } });
  });

  it("uses options.action over the current action", () => {
    const res = new CoursesController("index").renderWith({ id: 4 }, { action: "show" });
    expect(res.body).toEqual({ id: 4 });
  });

  it("does not fall back to a CRUD handler implicitly", () => {
    const res = new CoursesController("list").renderWith([{ id: 1 }]);
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: "Action not supported",
      details: {
        action: "list",
        controller: "courses",
        required_method: "respond_for_list",
      },
    });
  });

  it("renders the envelope when the alias target has no handler", () => {
    class DanglingController extends CoursesController {}
    DanglingController.mapAction("a", { to: "b" });

    const res = new DanglingController("a").renderWith([]);
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ details: { action: "a" } });
  });

  it("resolves alias cycles one hop without looping", () => {
    class CycleController extends CoursesController {}
    CycleController.mapActions({ a: "b", b: "a" });

    expect(new CycleController("a").renderWith([]).status).toBe(400);

    CycleController.defineHandler("b", function () {
      return this.emit({ handledBy: "b" });
    });
    expect(new CycleController("a").renderWith([]).body).toEqual({ handledBy: "b" });
  });

  it("renders the full unsupported-action envelope", () => {
    class WidgetsController extends TestController {}
    WidgetsController.useSerializers(
      new SerializerRegistry().register(CourseSerializer, "WidgetSerializer")
    );

    const res = new WidgetsController("unknown_action").renderWith({ id: 1 });

    expect(res).toEqual({
      status: 400,
      body: {
        error: "Action not supported",
        message: "The action 'unknown_action' is not supported by this controller",
        details: {
          action: "unknown_action",
          controller: "widgets",
          required_method: "respond_for_unknown_action",
        },
        suggestions: [
          "Define a 'respond_for_unknown_action' handler with defineHandler('unknown_action', ...) in your controller",
          "Use mapAction('unknown_action', { to: 'existing_action' }) to map it to an existing response handler",
        ],
      },
    });
  });

  it("respondFor throws MissingResponseHandlerError for an unknown action", () => {
    const controller = new CoursesController("index");
    expect(() => controller.respondFor("nope", [], CourseSerializer, {})).toThrow(
      MissingResponseHandlerError
    );
  });

  it("lets unrelated handler errors propagate", () => {
    class BoomController extends CoursesController {}
    BoomController.defineHandler("boom", () => {
      throw new Error("kaboom");
    });
    expect(() => new BoomController("boom").renderWith([])).toThrow("kaboom");
  });
});

describe("renderWith — context", () => {
  it("keeps a caller-supplied view over the view param", () => {
    const res = new CoursesController("show", { view: "b" }).renderWith(
      { id: 1 },
      { context: { view: "a" } }
    );
    expect(res.body).toEqual({ id: 1, view: "a" });
  });

  it("takes the view from params when the context has none", () => {
    const res = new CoursesController("show", { view: "b" }).renderWith({ id: 1 });
    expect(res.body).toEqual({ id: 1, view: "b" });
  });

  it("merges the current user over the caller's context", () => {
    class WhoController extends CoursesController {}
    WhoController.defineHandler("who", function (_record, _serializer, context) {
      return this.emit({ user: context.currentUser, hasUser: "currentUser" in context });
    });

    const signedIn = new WhoController("who", {}, { id: "u1" }).renderWith(null, {
      context: { currentUser: "spoofed" },
    });
    expect(signedIn.body).toEqual({ user: { id: "u1" }, hasUser: true });

    const anonymous = new WhoController("who").renderWith(null);
    expect(anonymous.body).toEqual({ user: undefined, hasUser: false });
  });

  it("passes an explicit serializer through untouched", () => {
    class UpperSerializer extends CourseSerializer {
      public override toHash(): Record<string, unknown> {
        return { ...super.toHash(), upper: true };
      }
    }
    const res = new CoursesController("show").renderWith({ id: 2 }, { serializer: UpperSerializer });
    expect(res.body).toEqual({ id: 2, upper: true });
  });

  it("throws when no serializer registry is configured", () => {
    class NoRegistryController extends TestController {}
    expect(() => new NoRegistryController("index").renderWith([])).toThrow(
      SerializerResolutionError
    );
    expect(() => new NoRegistryController("index").renderWith([])).toThrow(
      /NoRegistrySerializer/
    );
  });
});

describe("renderWith — persistence defaults", () => {
  it("create renders the item with created status when save succeeds", () => {
    const res = new CoursesController("create").renderWith(new FakeRecord(7));
    expect(res).toEqual({ status: 201, body: { id: 7 } });
    expect(res.body).not.toHaveProperty("errors");
  });

  it("create renders errors with unprocessable status when save fails", () => {
    const res = new CoursesController("create").renderWith(
      new FakeRecord(7, false, ["Name can't be blank"])
    );
    expect(res).toEqual({ status: 422, body: { errors: ["Name can't be blank"] } });
    expect(res.body).not.toHaveProperty("data");
  });

  it("update renders the item when the record is valid", () => {
    const res = new CoursesController("update").renderWith(new FakeRecord(3));
    expect(res).toEqual({ status: 200, body: { id: 3 } });
  });

  it("update renders validation errors", () => {
    const res = new CoursesController("update").renderWith(
      new FakeRecord(3, false, ["Price is invalid"])
    );
    expect(res).toEqual({ status: 422, body: { errors: ["Price is invalid"] } });
  });

  it("destroy renders the deletion message", () => {
    const res = new CoursesController("destroy").renderWith(new FakeRecord(3));
    expect(res).toEqual({ status: 200, body: { message: RECORD_DELETED_MESSAGE } });
    expect(RECORD_DELETED_MESSAGE).toBe("Record deleted successfully");
  });

  it("destroy renders errors when delete fails", () => {
    const res = new CoursesController("destroy").renderWith(
      new FakeRecord(3, false, ["Cannot delete"])
    );
    expect(res).toEqual({ status: 422, body: { errors: ["Cannot delete"] } });
  });

  it("rejects a record without persistence methods", () => {
    expect(() => new CoursesController("create").renderWith({ id: 1 })).toThrow(
      "Action 'create' requires a persistable record"
    );
  });
});

describe("renderWith — responders", () => {
  class FeaturedResponder extends ResponderBase {
    public static override readonly actions: readonly string[] = ["featured"];

    public featured() {
      return this.renderJson({ from: "responder", count: this.serializeCollection().length });
    }

    public override render() {
      return this.renderJson({ from: "render" });
    }
  }

  it("calls the responder action and never consults the resolver", () => {
    class BypassController extends CoursesController {}
    let handlerCalls = 0;
    BypassController.defineHandler("featured", function () {
      handlerCalls += 1;
      return this.emit({ from: "controller" });
    });

    const controller = new BypassController("featured");
    const lookups = vi.spyOn(controller, "hasResponseHandler");
    const res = controller.renderWith([{ id: 1 }, { id: 2 }], {
      responder: FeaturedResponder,
      action: "featured",
    });

    expect(res.body).toEqual({ from: "responder", count: 2 });
    expect(handlerCalls).toBe(0);
    expect(lookups).not.toHaveBeenCalled();
  });

  it("falls back to render() for an undeclared action", () => {
    const res = new CoursesController("index").renderWith([], {
      responder: FeaturedResponder,
      action: "other",
    });
    expect(res.body).toEqual({ from: "render" });
  });

  it("falls back to render() when no action is given", () => {
    const res = new CoursesController("featured").renderWith([], {
      responder: FeaturedResponder,
    });
    expect(res.body).toEqual({ from: "render" });
  });

  it("propagates a responder without render()", () => {
    class BareResponder extends ResponderBase {}
    expect(() =>
      new CoursesController("index").renderWith([], { responder: BareResponder })
    ).toThrow(ResponderNotImplementedError);
    expect(() =>
      new CoursesController("index").renderWith([], { responder: BareResponder })
    ).toThrow("BareResponder must implement #render");
  });
});

describe("generated handlers", () => {
  it("defineHandlers installs one body for several actions", () => {
    class BatchController extends CoursesController {}
    BatchController.defineHandlers(["export", "print"], function () {
      return this.emit({ format: this.actionName() });
    });

    expect(new BatchController("export").renderWith([]).body).toEqual({ format: "export" });
    expect(new BatchController("print").renderWith([]).body).toEqual({ format: "print" });
  });

  it("CRUD list handlers merge the context function result and see a frozen scope", () => {
    class CrudController extends CoursesController {}
    const seen: ResponseScope[] = [];
    CrudController.defineCrudHandlers({
      listActions: ["browse"],
      collectionContext: (scope) => {
        seen.push(scope);
        return { view: "compact" };
      },
    });

    const record = [{ id: 1 }];
    const res = new CrudController("browse", { category: "x" }, { id: "u1" }).renderWith(record);

    expect(res).toEqual({ status: 200, body: { data: [{ id: 1, view: "compact" }] } });
    expect(seen).toHaveLength(1);
    expect(seen[0]).toEqual({
      action: "browse",
      controllerName: "courses",
      params: { category: "x" },
      currentUser: { id: "u1" },
      record,
      context: { currentUser: { id: "u1" } },
    });
    expect(Object.isFrozen(seen[0])).toBe(true);
  });

  it("CRUD show handlers ignore a non-map context result", () => {
    class CrudShowController extends CoursesController {}
    CrudShowController.defineCrudHandlers({
      showActions: ["peek"],
      itemContext: () => "not a map",
    });

    const res = new CrudShowController("peek").renderWith({ id: 2 });
    expect(res.body).toEqual({ data: { id: 2 } });
  });

  it("REST handlers delegate to built-ins with the configured context underneath", () => {
    class AdminController extends CoursesController {}
    AdminController.generateRestHandlers({ namespace: "admin", context: { view: "full" } });

    expect(new AdminController("admin_index").renderWith([{ id: 1 }]).body).toEqual({
      data: [{ id: 1, view: "full" }],
    });
    expect(new AdminController("admin_show", { view: "b" }).renderWith({ id: 1 }).body).toEqual({
      id: 1,
      view: "b",
    });
    expect(new AdminController("admin_create").renderWith(new FakeRecord(5)).status).toBe(201);
  });

  it("REST index on a paginated list answers with the built-in's meta", () => {
    class PagedAdminController extends CoursesController {}
    PagedAdminController.generateRestHandlers({ namespace: "admin", actions: ["index"] });

    const list = new PaginatedList([{ id: 1 }], 1, 1, 4);
    expect(new PagedAdminController("admin_index").renderWith(list).body).toEqual({
      data: [{ id: 1 }],
      meta: { currentPage: 1, totalPages: 4, totalCount: 4, perPage: 1 },
    });
  });

  it("REST handlers delegate to a custom handler for the base action", () => {
    class CustomBaseController extends CoursesController {}
    CustomBaseController.generateRestHandlers({ namespace: "api", actions: ["show"], context: { view: "full" } });
    CustomBaseController.defineHandler("show", function (_record, _serializer, context) {
      return this.emit({ custom: context.view });
    });

    expect(new CustomBaseController("api_show").renderWith({ id: 1 }).body).toEqual({ custom: "full" });
  });

  it("un-namespaced REST handlers delegate to what they shadow", () => {
    class PlainRestController extends CoursesController {}
    PlainRestController.generateRestHandlers({ actions: ["show"] });

    expect(new PlainRestController("show").renderWith({ id: 3 }).body).toEqual({ id: 3 });
  });

  it("REST handlers without a default behavior render 501", () => {
    class PublishController extends CoursesController {}
    PublishController.generateRestHandlers({ namespace: "v2", actions: ["publish"] });

    expect(new PublishController("v2_publish").renderWith({ id: 1 })).toEqual({
      status: 501,
      body: { error: "No default behavior for action publish" },
    });
  });
});
