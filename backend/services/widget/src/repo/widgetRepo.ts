// backend/services/widget/src/repo/widgetRepo.ts
/**
 * Purpose:
 * - Process-local widget store. Insertion order is the listing order.
 * - Seeded from data/widgets.json, validated with zod on load.
 */

import { z } from "zod";
import seedRows from "../data/widgets.json";
import { WidgetNotFoundError } from "../errors";
import {
  Widget,
  zWidgetRecord,
  type WidgetInput,
  type WidgetRecord,
  type WidgetStore,
} from "../models/Widget";

export function loadSeed(): WidgetRecord[] {
  return z.array(zWidgetRecord).parse(seedRows);
}

export class WidgetRepo implements WidgetStore {
  #rows = new Map<string, Widget>();
  #seq = 0;

  constructor(seed: readonly WidgetRecord[] = []) {
    for (const { id, ...attrs } of seed) {
      this.#rows.set(id, new Widget(this, attrs, id));
    }
  }

  public static seeded(): WidgetRepo {
    return new WidgetRepo(loadSeed());
  }

  // ── WidgetStore ─────────────────────────────────────────────────────────────

  public nextId(): string {
    let id: string;
    do {
      id = `w${++this.#seq}`;
    } while (this.#rows.has(id));
    return id;
  }

  public write(widget: Widget): void {
    if (widget.id !== undefined) this.#rows.set(widget.id, widget);
  }

  public remove(id: string): boolean {
    return this.#rows.delete(id);
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  public all(): Widget[] {
    return [...this.#rows.values()];
  }

  public find(id: string): Widget | undefined {
    return this.#rows.get(id);
  }

  public findOrThrow(id: string): Widget {
    const found = this.#rows.get(id);
    if (!found) throw new WidgetNotFoundError(id);
    return found;
  }

  public featured(): Widget[] {
    return this.all().filter((w) => w.featured);
  }

  /** Most viewed first. */
  public popular(limit: number): Widget[] {
    return this.all()
      .sort((a, b) => b.views - a.views)
      .slice(0, Math.max(0, limit));
  }

  public inCategory(category: string | undefined): Widget[] {
    if (!category) return this.all();
    return this.all().filter((w) => w.category === category);
  }

  public ownedBy(ownerId: string): Widget[] {
    return this.all().filter((w) => w.ownerId === ownerId);
  }

  /** Unsaved widget; create persists it through save(). */
  public build(input: WidgetInput, ownerId?: string): Widget {
    return new Widget(this, {
      name: input.name ?? "",
      category: input.category ?? "",
      price: input.price ?? 0,
      featured: input.featured ?? false,
      views: 0,
      ownerId,
      locked: false,
      parts: input.parts ?? [],
    });
  }
}
