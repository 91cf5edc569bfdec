/**
 * Route Helpers
 */

import type { Context } from "hono";
import type { z } from "zod";

export const USER_HEADER = "x-user-id";
export const ANONYMOUS_USER = "anonymous";

/** Caller identity from the x-user-id header (no authentication). */
export function getUserId(c: Context): string {
  return c.req.header(USER_HEADER)?.trim() || ANONYMOUS_USER;
}

/** Parsed JSON body, or undefined when the body is missing or malformed. */
export async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

/** One line per validation issue, prefixed with the field path. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
