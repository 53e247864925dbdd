// backend/services/shared/src/responder/ApplicationResponder.ts
/**
 * Purpose:
 * - Convenience layer most service responders extend: listing/item
 *   envelopes with a common meta block, request-param helpers.
 *
 * Example:
 *   class ProductResponder extends ApplicationResponder {
 *     static override readonly actions = ["featured", "popular"];
 *
 *     featured() {
 *       return this.renderListing({ type: "featured" });
 *     }
 *   }
 */

import { isCollection } from "../record/recordTypes";
import type { RenderedResponse } from "../respond/responseTypes";
import { ResponderBase } from "./ResponderBase";

export const DEFAULT_FILTER_KEYS: readonly string[] = Object.freeze([
  "category",
  "status",
  "sort",
  "limit",
]);

export class ApplicationResponder extends ResponderBase {
  /** Collection with base meta, `type` and any extra meta (later keys win). */
  protected renderListing(
    opts: { type?: string; additionalMeta?: Record<string, unknown> } = {}
  ): RenderedResponse {
    const meta: Record<string, unknown> = { ...this.baseMeta() };
    if (opts.type !== undefined) meta.type = opts.type;
    return this.renderCollectionWithMeta(undefined, {
      ...meta,
      ...(opts.additionalMeta ?? {}),
    });
  }

  protected renderItemWithMeta(
    additionalMeta: Record<string, unknown> = {}
  ): RenderedResponse {
    return this.renderJson({
      data: this.serializeItem(),
      meta: { ...this.baseMeta(), ...additionalMeta },
    });
  }

  /** Pre-structured payloads (grouped/categorized) pass through untouched. */
  protected renderGroupedData(groups: unknown): RenderedResponse {
    return this.renderJson(groups);
  }

  protected baseMeta(): Record<string, unknown> {
    const meta: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
    };
    const count = this.recordCount();
    if (count !== undefined) meta.count = count;
    return meta;
  }

  protected recordCount(): number | undefined {
    const record = this.record;
    if (!isCollection(record)) return undefined;
    return Array.isArray(record) ? record.length : Array.from(record).length;
  }

  protected paramPresent(key: string): boolean {
    const value = this.params()[key];
    return value !== undefined && value.trim() !== "";
  }

  /** Present params among `keys`, or undefined when none are. */
  protected filtersApplied(
    keys: readonly string[] = DEFAULT_FILTER_KEYS
  ): Record<string, string> | undefined {
    const filters: Record<string, string> = {};
    const params = this.params();
    for (const key of keys) {
      const value = params[key];
      if (value !== undefined && value.trim() !== "") filters[key] = value;
    }
    return Object.keys(filters).length > 0 ? filters : undefined;
  }
}
