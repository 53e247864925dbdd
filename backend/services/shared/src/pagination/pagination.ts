// backend/services/shared/src/pagination/pagination.ts
/**
 * Purpose:
 * - Detect paginated collections and extract a normalized meta block.
 * - PaginatedList is the in-process paginated collection services hand to
 *   renderWith(); any object with the same numeric fields is detected too.
 *
 * Invariants:
 * - Absent fields are omitted, never null/zero.
 * - context.meta is merged on top of the pagination fields (context wins).
 */

import type { SerializationContext } from "../serializer/serializerTypes";

export interface Paginated {
  readonly currentPage: number;
  readonly totalPages: number;
  readonly totalCount: number;
  readonly perPage?: number;
  readonly limitValue?: number;
}

export type PaginationMeta = {
  currentPage?: number;
  totalPages?: number;
  totalCount?: number;
  perPage?: number;
  [key: string]: unknown;
};

function numberField(value: object, key: string): number | undefined {
  const v: unknown = Reflect.get(value, key);
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function isPaginated(record: unknown): record is Paginated {
  if (record === null || typeof record !== "object") return false;
  return (
    numberField(record, "currentPage") !== undefined &&
    numberField(record, "totalPages") !== undefined &&
    numberField(record, "totalCount") !== undefined
  );
}

export function paginationMeta(
  record: Paginated,
  context: SerializationContext = {}
): PaginationMeta {
  const meta: PaginationMeta = {};

  const currentPage = numberField(record, "currentPage");
  const totalPages = numberField(record, "totalPages");
  const totalCount = numberField(record, "totalCount");
  const perPage =
    numberField(record, "perPage") ??
    numberField(record, "limitValue") ??
    (typeof context.perPage === "number" ? context.perPage : undefined);

  if (currentPage !== undefined) meta.currentPage = currentPage;
  if (totalPages !== undefined) meta.totalPages = totalPages;
  if (totalCount !== undefined) meta.totalCount = totalCount;
  if (perPage !== undefined) meta.perPage = perPage;

  return context.meta ? Object.assign(meta, context.meta) : meta;
}

// ────────────────────────────────────────────────────────────────────────────
// In-process paginated collection
// ────────────────────────────────────────────────────────────────────────────

export class PaginatedList<T> implements Iterable<T>, Paginated {
  constructor(
    public readonly items: readonly T[],
    public readonly currentPage: number,
    public readonly perPage: number,
    public readonly totalCount: number
  ) {}

  public get totalPages(): number {
    if (this.perPage <= 0) return 0;
    return Math.ceil(this.totalCount / this.perPage);
  }

  public get length(): number {
    return this.items.length;
  }

  public [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

/** Slice a full result set into one page (1-based). */
export function paginate<T>(
  all: readonly T[],
  opts: { page: number; perPage: number }
): PaginatedList<T> {
  const page = Math.max(1, Math.floor(opts.page));
  const perPage = Math.max(1, Math.floor(opts.perPage));
  const start = (page - 1) * perPage;
  return new PaginatedList(
    all.slice(start, start + perPage),
    page,
    perPage,
    all.length
  );
}
