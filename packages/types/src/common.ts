import { z } from "zod";

export const MAX_PAGE_SIZE = 100;

export const errorCodeSchema = z.enum([
  "INVALID_INPUT",
  "UNAUTHORIZED",
  "FORBIDDEN",
  "NOT_FOUND",
  "CONFLICT",
  "UNAVAILABLE",
  "INTERNAL"
]);

export const errorIssueSchema = z.object({
  path: z.string(),
  message: z.string()
});

/**
 * Shape of every non-2xx response body. `issues` is only present for
 * boundary validation failures.
 */
export const errorEnvelopeSchema = z.object({
  code: errorCodeSchema,
  message: z.string(),
  requestId: z.string(),
  timestamp: z.string(),
  issues: z.array(errorIssueSchema).optional()
});

/**
 * Query-string pagination. Out-of-range or malformed values fall back to
 * the defaults instead of failing the request.
 */
export const createPaginationSchema = (defaultLimit: number) =>
  z.object({
    page: z.coerce.number().int().min(1).catch(1),
    limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).catch(defaultLimit)
  });

export const paginationSchema = createPaginationSchema(10);

export const ownerSummarySchema = z.object({
  id: z.string(),
  fullName: z.string(),
  username: z.string()
});

export type ErrorCode = z.infer<typeof errorCodeSchema>;
export type ErrorIssue = z.infer<typeof errorIssueSchema>;
export type ErrorEnvelope = z.infer<typeof errorEnvelopeSchema>;
export type Pagination = z.infer<typeof paginationSchema>;
export type OwnerSummary = z.infer<typeof ownerSummarySchema>;

export interface Page<TItem> {
  items: TItem[];
  page: number;
  limit: number;
}
