// backend/services/shared/src/contracts/responses.ts
/**
 * Wire contracts for the envelopes renderWith() emits. Services use these in
 * tests (zX.parse(res.body)) and clients may use them to validate responses.
 */

import { z } from "zod";

export const zPaginationMeta = z
  .object({
    currentPage: z.number().int().min(1).optional(),
    totalPages: z.number().int().min(0).optional(),
    totalCount: z.number().int().min(0).optional(),
    perPage: z.number().int().min(1).optional(),
  })
  .passthrough();

/** { data: [...], meta?: {...} } */
export const zCollectionEnvelope = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    data: z.array(item),
    meta: z.record(z.unknown()).optional(),
  });

/** { data: {...} } */
export const zItemEnvelope = <T extends z.ZodTypeAny>(item: T) =>
  z.object({ data: item });

export const zValidationErrors = z.object({
  errors: z.array(z.string()),
});
export type ValidationErrorsBody = z.infer<typeof zValidationErrors>;

export const zDestroyed = z.object({ message: z.string() });

export const zUnsupportedAction = z.object({
  error: z.literal("Action not supported"),
  message: z.string(),
  details: z.object({
    action: z.string(),
    controller: z.string(),
    required_method: z.string().startsWith("respond_for_"),
  }),
  suggestions: z.tuple([z.string(), z.string()]),
});

/** RFC 7807 Problem+JSON, as rendered by middleware/problem.ts */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  code: z.string().optional(),
  requestId: z.string().optional(),
});
export type Problem = z.infer<typeof zProblem>;
