// backend/leaderboard/validation.ts
import { z } from "zod";
import { fail, ok, ValidationError, type LeaderboardResult } from "./errors.js";
import type { PageRequest } from "./leaderboard.types.js";

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

const pageRequestSchema = z.object({
  page: z
    .number({ invalid_type_error: "page must be a number" })
    .int("page must be an integer")
    .safe("page is too large")
    .min(1, "page must be at least 1"),
  pageSize: z
    .number({ invalid_type_error: "pageSize must be a number" })
    .int("pageSize must be an integer")
    .min(1, "pageSize must be at least 1")
    .max(MAX_PAGE_SIZE, `pageSize must be at most ${MAX_PAGE_SIZE}`),
});

// page_size is the public query name; pageSize is accepted as an alias.
const pageQuerySchema = z.object({
  page: z.coerce.number({ invalid_type_error: "page must be a number" }).default(1),
  page_size: z.coerce.number({ invalid_type_error: "page_size must be a number" }).optional(),
  pageSize: z.coerce.number({ invalid_type_error: "pageSize must be a number" }).optional(),
});

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid page request";
}

export function validatePageRequest(input: PageRequest): LeaderboardResult<PageRequest, ValidationError> {
  const parsed = pageRequestSchema.safeParse(input);
  if (!parsed.success) return fail(new ValidationError(firstIssue(parsed.error)));
  return ok(parsed.data);
}

export function parsePageQuery(query: Record<string, unknown>): LeaderboardResult<PageRequest, ValidationError> {
  const parsed = pageQuerySchema.safeParse(query);
  if (!parsed.success) return fail(new ValidationError(firstIssue(parsed.error)));

  const { page, page_size, pageSize } = parsed.data;
  return validatePageRequest({
    page,
    pageSize: page_size ?? pageSize ?? DEFAULT_PAGE_SIZE,
  });
}
