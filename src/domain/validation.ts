/**
 * Runtime validation for lookup input using Zod.
 * Runs before any saved query is issued.
 */

import { z } from "zod";
import { SEARCH_KINDS, type SearchRequest } from "./types.js";

export const searchRequestSchema = z.object({
  term: z
    .string({ required_error: "term is required", invalid_type_error: "term must be a string" })
    .trim()
    .min(1, "term must not be empty"),
  kind: z.enum(SEARCH_KINDS, {
    errorMap: () => ({ message: `kind must be one of ${SEARCH_KINDS.join(", ")}` }),
  }),
});

/** Safe parse: returns { success: true, data } or { success: false, error } */
export function parseSearchRequest(input: unknown): z.SafeParseReturnType<unknown, SearchRequest> {
  return searchRequestSchema.safeParse(input);
}

export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message))
    .join("; ");
}
