// backend/services/widget/src/serializers/WidgetSerializer.ts
/**
 * Views:
 * - minimal  → id, name
 * - summary  → + category, price, featured
 * - (default/full) → + views, locked, parts, editable
 * Admin contexts (context.admin === true) also expose ownerId.
 */

import { SerializerBase, SerializerRegistry } from "@render-with/shared";
import { isWidgetUser } from "../middleware/currentUser";
import { Widget, zWidgetPart, type WidgetPart } from "../models/Widget";

export class PartSerializer extends SerializerBase<WidgetPart> {
  protected accept(resource: unknown): WidgetPart {
    const parsed = zWidgetPart.safeParse(resource);
    return parsed.success ? parsed.data : this.reject(resource);
  }

  public override toHash(): Record<string, unknown> {
    return { sku: this.resource.sku, qty: this.resource.qty };
  }
}

export class WidgetSerializer extends SerializerBase<Widget> {
  protected accept(resource: unknown): Widget {
    return resource instanceof Widget ? resource : this.reject(resource);
  }

  public override toHash(): Record<string, unknown> {
    const w = this.resource;
    const minimal = { id: w.id, name: w.name };
    if (this.view === "minimal") return minimal;

    const summary = {
      ...minimal,
      category: w.category,
      price: w.price,
      featured: w.featured,
    };
    if (this.view === "summary") return summary;

    const full: Record<string, unknown> = {
      ...summary,
      views: w.views,
      locked: w.locked,
      parts: this.serializeAssociation(w.parts, PartSerializer),
      editable: this.isOwner(),
    };
    if (this.context.admin === true) full.ownerId = w.ownerId ?? null;
    return full;
  }

  private isOwner(): boolean {
    const user = this.currentUser;
    return isWidgetUser(user) && user.id === this.resource.ownerId;
  }
}

export const widgetSerializers = new SerializerRegistry()
  .register(WidgetSerializer)
  .register(PartSerializer);
