// backend/services/widget/src/controllers/WidgetsController.ts
/**
 * Purpose:
 * - Widgets API. Action methods only load records and call renderWith();
 *   the response shape comes from the handler the action resolves to.
 *
 * Resolution map (configured below the class):
 * - index/show/create/update/destroy → built-ins
 * - catalog, search → index; lookup → show            (aliases)
 * - stats, mine, export/print                         (custom handlers)
 * - browse / preview                                  (CRUD handlers)
 * - admin_* → built-ins with admin context            (REST handlers)
 * - legacy_archive → 501                              (REST, no default)
 * - featured/popular/grouped                          (WidgetResponder)
 * - clone                                             (nothing; 400 envelope)
 */

import {
  ControllerExpressBase,
  RecordCapabilityError,
  isCollection,
  paginate,
  type RenderedResponse,
} from "@render-with/shared";
import { WidgetInputError } from "../errors";
import { isWidgetUser, type WidgetUser } from "../middleware/currentUser";
import { Widget, zWidgetInput, type WidgetInput } from "../models/Widget";
import { WidgetRepo } from "../repo/widgetRepo";
import { WidgetResponder } from "../responders/WidgetResponder";
import { widgetSerializers } from "../serializers/WidgetSerializer";

const POPULAR_LIMIT = 5;

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export class WidgetsController extends ControllerExpressBase {
  // ───────────────────────────────────────────
  // Collaborators
  // ───────────────────────────────────────────

  public widgetUser(): WidgetUser | undefined {
    const user = this.currentUser();
    return isWidgetUser(user) ? user : undefined;
  }

  private repo(): WidgetRepo {
    const repo: unknown = this.res.locals.widgetRepo;
    if (!(repo instanceof WidgetRepo)) {
      throw new Error("res.locals.widgetRepo is not set; mount provideWidgetRepo()");
    }
    return repo;
  }

  private defaultPerPage(): number {
    const perPage: unknown = this.res.locals.defaultPerPage;
    return typeof perPage === "number" ? perPage : 10;
  }

  private input(): WidgetInput {
    const parsed = zWidgetInput.safeParse(this.req.body ?? {});
    if (!parsed.success) {
      const summary = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`)
        .join("; ");
      throw new WidgetInputError(`Invalid widget: ${summary}`);
    }
    return parsed.data;
  }

  private widget(): Widget {
    return this.repo().findOrThrow(this.params().id ?? "");
  }

  private page(widgets: Widget[]) {
    const params = this.params();
    return paginate(widgets, {
      page: positiveInt(params.page, 1),
      perPage: positiveInt(params.per_page, this.defaultPerPage()),
    });
  }

  // ───────────────────────────────────────────
  // Built-in CRUD
  // ───────────────────────────────────────────

  public index(): RenderedResponse {
    return this.renderWith(this.page(this.repo().inCategory(this.params().category)));
  }

  public show(): RenderedResponse {
    return this.renderWith(this.widget());
  }

  public create(): RenderedResponse {
    return this.renderWith(this.repo().build(this.input(), this.widgetUser()?.id));
  }

  public update(): RenderedResponse {
    const widget = this.widget();
    widget.update(this.input());
    return this.renderWith(widget);
  }

  public destroy(): RenderedResponse {
    return this.renderWith(this.widget());
  }

  // ───────────────────────────────────────────
  // Aliased actions
  // ───────────────────────────────────────────

  public catalog(): RenderedResponse {
    return this.renderWith(this.repo().all(), {
      context: { meta: { source: "catalog" } },
    });
  }

  public search(): RenderedResponse {
    const q = (this.params().q ?? "").trim().toLowerCase();
    const hits = this.repo()
      .all()
      .filter((w) => w.name.toLowerCase().includes(q));
    return this.renderWith(this.page(hits), { context: { meta: { query: q } } });
  }

  public lookup(): RenderedResponse {
    return this.renderWith(this.widget());
  }

  // ───────────────────────────────────────────
  // Custom handlers
  // ───────────────────────────────────────────

  public stats(): RenderedResponse {
    return this.renderWith(this.repo().all());
  }

  public mine(): RenderedResponse {
    const user = this.widgetUser();
    return this.renderWith(user ? this.repo().ownedBy(user.id) : []);
  }

  public export(): RenderedResponse {
    return this.renderWith(this.repo().all());
  }

  public print(): RenderedResponse {
    return this.renderWith(this.repo().all());
  }

  public browse(): RenderedResponse {
    return this.renderWith(this.repo().inCategory(this.params().category));
  }

  public preview(): RenderedResponse {
    return this.renderWith(this.widget());
  }

  // ───────────────────────────────────────────
  // Generated REST handlers
  // ───────────────────────────────────────────

  public adminIndex(): RenderedResponse {
    return this.renderWith(this.page(this.repo().all()), { action: "admin_index" });
  }

  public adminShow(): RenderedResponse {
    return this.renderWith(this.widget(), { action: "admin_show" });
  }

  public adminCreate(): RenderedResponse {
    return this.renderWith(this.repo().build(this.input()), { action: "admin_create" });
  }

  public adminUpdate(): RenderedResponse {
    const widget = this.widget();
    widget.update(this.input());
    return this.renderWith(widget, { action: "admin_update" });
  }

  public adminDestroy(): RenderedResponse {
    return this.renderWith(this.widget(), { action: "admin_destroy" });
  }

  public archive(): RenderedResponse {
    return this.renderWith(this.widget(), { action: "legacy_archive" });
  }

  // ───────────────────────────────────────────
  // Responder-backed
  // ───────────────────────────────────────────

  public featured(): RenderedResponse {
    return this.renderWith(this.repo().featured(), {
      responder: WidgetResponder,
      action: "featured",
    });
  }

  public popular(): RenderedResponse {
    return this.renderWith(this.repo().popular(POPULAR_LIMIT), {
      responder: WidgetResponder,
      action: "popular",
    });
  }

  public grouped(): RenderedResponse {
    return this.renderWith(this.repo().all(), { responder: WidgetResponder });
  }

  // No handler, alias or responder: renders the unsupported-action envelope.
  public clone(): RenderedResponse {
    return this.renderWith(this.widget());
  }
}

// ────────────────────────────────────────────────────────────────────────────
// Response configuration
// ────────────────────────────────────────────────────────────────────────────

WidgetsController.useSerializers(widgetSerializers);

WidgetsController.mapAction("catalog", { to: "index" });
WidgetsController.mapActions({ search: "index", lookup: "show" });

WidgetsController.defineHandler("stats", function (record) {
  if (!isCollection(record)) throw new RecordCapabilityError("stats", "collection");
  const byCategory: Record<string, number> = {};
  let total = 0;
  for (const item of record) {
    total += 1;
    if (item instanceof Widget) {
      byCategory[item.category] = (byCategory[item.category] ?? 0) + 1;
    }
  }
  return this.emit({ data: { total, byCategory } });
});

WidgetsController.defineHandler("mine", function (record, serializer, context) {
  const items = isCollection(record) ? record : [record];
  return this.emit({
    data: this.serializeCollection(items, serializer, context),
    meta: { owner: this.widgetUser()?.id ?? null },
  });
});

WidgetsController.defineHandlers(["export", "print"], function (record, serializer, context) {
  if (!isCollection(record)) throw new RecordCapabilityError(this.actionName(), "collection");
  return this.emit({
    format: this.actionName(),
    data: this.serializeCollection(record, serializer, { ...context, view: "minimal" }),
  });
});

WidgetsController.defineCrudHandlers({
  listActions: ["browse"],
  showActions: ["preview"],
  collectionContext: (scope) => ({
    view: "summary",
    category: scope.params.category ?? null,
  }),
  itemContext: (scope) => ({
    view: scope.currentUser === undefined ? "summary" : "full",
  }),
});

WidgetsController.generateRestHandlers({
  namespace: "admin",
  context: { view: "full", admin: true },
});

WidgetsController.generateRestHandlers({
  namespace: "legacy",
  actions: ["archive"],
});
