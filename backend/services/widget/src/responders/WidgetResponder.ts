// backend/services/widget/src/responders/WidgetResponder.ts
import {
  ApplicationResponder,
  isCollection,
  type RenderedResponse,
} from "@render-with/shared";
import { Widget } from "../models/Widget";

export class WidgetResponder extends ApplicationResponder {
  public static override readonly actions: readonly string[] = [
    "featured",
    "popular",
  ];

  public featured(): RenderedResponse {
    const filters = this.filtersApplied();
    return this.renderListing({
      type: "featured",
      additionalMeta: filters ? { filters } : {},
    });
  }

  public popular(): RenderedResponse {
    return this.renderListing({
      type: "popular",
      additionalMeta: { rankedBy: "views" },
    });
  }

  /** Widgets grouped by category, or one widget with meta. */
  public override render(): RenderedResponse {
    if (this.isSingleItem()) return this.renderItemWithMeta();

    const groups: Record<string, Array<Record<string, unknown>>> = {};
    for (const item of this.collectionItems()) {
      const key = item instanceof Widget ? item.category : "uncategorized";
      (groups[key] ??= []).push(this.serializeItem(item));
    }
    return this.renderGroupedData({ data: groups, meta: this.baseMeta() });
  }

  private collectionItems(): unknown[] {
    return isCollection(this.record) ? Array.from(this.record) : [];
  }
}
