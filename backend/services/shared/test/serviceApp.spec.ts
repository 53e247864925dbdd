// backend/services/shared/test/serviceApp.spec.ts
import request from "supertest";
import type { Router } from "express";
import { describe, expect, it } from "vitest";
import { createServiceApp } from "../src/app/createServiceApp";
import {
  ControllerExpressBase,
  routeTo,
} from "../src/base/controller/ControllerExpressBase";
import { zProblem, zUnsupportedAction } from "../src/contracts/responses";
import { SerializerRegistry } from "../src/serializer/SerializerRegistry";
import { CourseSerializer } from "./helpers/courses";

class LessonsController extends ControllerExpressBase {
  public index() {
    return this.renderWith([{ id: 1 }, { id: 2 }]);
  }

  public show() {
    return this.renderWith({ id: this.params().id });
  }

  public echo() {
    return this.renderWith({ id: "echo" }, { action: "echo" });
  }

  public broken() {
    return this.renderWith({ id: 1 }, { action: "index" });
  }

  public unknown() {
    return this.renderWith({ id: 1 });
  }
}

LessonsController.useSerializers(
  new SerializerRegistry().register(CourseSerializer, "LessonSerializer")
);
LessonsController.defineHandler("echo", function () {
  return this.emit({ params: this.params(), user: this.currentUser() ?? null });
});

function buildApp() {
  return createServiceApp({
    serviceName: "lessons",
    apiPrefix: "/api",
    before: [
      (req, res, next) => {
        const user = req.get("x-user-id");
        if (user) res.locals.currentUser = { id: user };
        next();
      },
    ],
    mountRoutes: (api: Router) => {
      api.get("/lessons", routeTo(LessonsController, "index"));
      api.get("/lessons/echo/:slug", routeTo(LessonsController, "echo"));
      api.get("/lessons/broken", routeTo(LessonsController, "broken"));
      api.get("/lessons/unknown", routeTo(LessonsController, "unknown"));
      api.get("/lessons/:id", routeTo(LessonsController, "show"));
    },
  });
}

describe("createServiceApp + ControllerExpressBase", () => {
  it("serves health", async () => {
    const res = await request(buildApp()).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ ok: true, service: "lessons" });
  });

  it("renders through the built-in index", async () => {
    const res = await request(buildApp()).get("/api/lessons");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ data: [{ id: 1 }, { id: 2 }] });
  });

  it("passes the view query param into the context", async () => {
    const res = await request(buildApp()).get("/api/lessons/42?view=card");
    expect(res.body).toEqual({ id: "42", view: "card" });
  });

  it("merges query and route params and exposes the current user", async () => {
    const res = await request(buildApp())
      .get("/api/lessons/echo/intro?slug=ignored&tag=a&tag=b")
      .set("x-user-id", "u1");
    expect(res.body).toEqual({
      params: { slug: "intro", tag: "a" },
      user: { id: "u1" },
    });
  });

  it("renders the unsupported-action envelope with 400", async () => {
    const res = await request(buildApp()).get("/api/lessons/unknown");
    expect(res.status).toBe(400);
    const body = zUnsupportedAction.parse(res.body);
    expect(body.details).toEqual({
      action: "unknown",
      controller: "lessons",
      required_method: "respond_for_unknown",
    });
  });

  it("turns propagated errors into Problem+JSON", async () => {
    const res = await request(buildApp())
      .get("/api/lessons/broken")
      .set("x-request-id", "req-123");
    expect(res.status).toBe(500);
    expect(res.headers["content-type"]).toMatch(/application\/problem\+json/);
    expect(res.headers["x-request-id"]).toBe("req-123");
    expect(zProblem.parse(res.body)).toEqual({
      type: "about:blank",
      title: "Internal Server Error",
      status: 500,
      code: "RECORD_CAPABILITY_MISSING",
      detail: "Action 'index' requires a collection record",
      requestId: "req-123",
    });
  });

  it("answers unknown routes with a 404 problem", async () => {
    const res = await request(buildApp()).get("/api/nowhere");
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({
      title: "Not Found",
      status: 404,
      code: "NOT_FOUND",
      detail: "No route for GET /api/nowhere",
    });
  });
});
