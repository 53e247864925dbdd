// backend/services/widget/src/models/Widget.ts
/**
 * Purpose:
 * - In-memory widget entity. Implements the PersistableRecord capability so
 *   the built-in create/update/destroy handlers can act on it.
 *
 * Invariants:
 * - save()/update() validate first and never write an invalid widget.
 * - Locked widgets refuse delete() with a validation message.
 */

import { z } from "zod";
import type { PersistableRecord } from "@render-with/shared";

export const zWidgetPart = z.object({
  sku: z.string().min(1),
  qty: z.number().int().min(1),
});
export type WidgetPart = z.infer<typeof zWidgetPart>;

/** Full stored shape (seed rows). */
export const zWidgetRecord = z.object({
  id: z.string().min(1),
  name: z.string(),
  category: z.string(),
  price: z.number(),
  featured: z.boolean().default(false),
  views: z.number().int().min(0).default(0),
  ownerId: z.string().optional(),
  locked: z.boolean().default(false),
  parts: z.array(zWidgetPart).default([]),
});
export type WidgetRecord = z.infer<typeof zWidgetRecord>;

/** Writable fields accepted from a request body. */
export const zWidgetInput = z.object({
  name: z.string().trim().optional(),
  category: z.string().trim().optional(),
  price: z.number().optional(),
  featured: z.boolean().optional(),
  parts: z.array(zWidgetPart).optional(),
});
export type WidgetInput = z.infer<typeof zWidgetInput>;

export type WidgetAttrs = Omit<WidgetRecord, "id">;

export interface WidgetStore {
  nextId(): string;
  write(widget: Widget): void;
  remove(id: string): boolean;
}

export function validateWidget(attrs: WidgetAttrs): string[] {
  const errors: string[] = [];
  if (!attrs.name.trim()) errors.push("Name can't be blank");
  if (!attrs.category.trim()) errors.push("Category can't be blank");
  if (!Number.isFinite(attrs.price) || attrs.price < 0) {
    errors.push("Price must be greater than or equal to 0");
  }
  return errors;
}

export class Widget implements PersistableRecord {
  #errors: string[] = [];
  #id: string | undefined;
  #attrs: WidgetAttrs;

  constructor(
    private readonly store: WidgetStore,
    attrs: WidgetAttrs,
    id?: string
  ) {
    this.#attrs = { ...attrs, parts: [...attrs.parts] };
    this.#id = id;
  }

  public get id(): string | undefined {
    return this.#id;
  }
  public get name(): string {
    return this.#attrs.name;
  }
  public get category(): string {
    return this.#attrs.category;
  }
  public get price(): number {
    return this.#attrs.price;
  }
  public get featured(): boolean {
    return this.#attrs.featured;
  }
  public get views(): number {
    return this.#attrs.views;
  }
  public get ownerId(): string | undefined {
    return this.#attrs.ownerId;
  }
  public get locked(): boolean {
    return this.#attrs.locked;
  }
  public get parts(): readonly WidgetPart[] {
    return this.#attrs.parts;
  }

  public isPersisted(): boolean {
    return this.#id !== undefined;
  }

  public save(): boolean {
    this.#errors = validateWidget(this.#attrs);
    if (this.#errors.length > 0) return false;
    if (this.#id === undefined) this.#id = this.store.nextId();
    this.store.write(this);
    return true;
  }

  /** Apply a partial change; the stored widget is untouched when invalid. */
  public update(patch: WidgetInput): boolean {
    const next: WidgetAttrs = {
      ...this.#attrs,
      ...definedOnly(patch),
    };
    this.#errors = validateWidget(next);
    if (this.#errors.length > 0) return false;
    this.#attrs = next;
    this.store.write(this);
    return true;
  }

  public delete(): boolean {
    if (this.locked) {
      this.#errors = ["Locked widgets cannot be deleted"];
      return false;
    }
    this.#errors = [];
    return this.#id !== undefined && this.store.remove(this.#id);
  }

  public validationErrors(): readonly string[] {
    return this.#errors;
  }
}

function definedOnly(patch: WidgetInput): Partial<WidgetAttrs> {
  const out: Partial<WidgetAttrs> = {};
  if (patch.name !== undefined) out.name = patch.name;
  if (patch.category !== undefined) out.category = patch.category;
  if (patch.price !== undefined) out.price = patch.price;
  if (patch.featured !== undefined) out.featured = patch.featured;
  if (patch.parts !== undefined) out.parts = patch.parts;
  return out;
}
