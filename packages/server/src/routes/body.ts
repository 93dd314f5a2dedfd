/**
 * Request body parsing shared by the API routes
 */

import type { Context } from "hono";
import { z, type ZodIssue } from "zod";
import { RequestBodyError } from "../lib/http-errors.js";

/**
 * Detail and metadata values: strings, numbers and booleans, all turned into
 * strings
 */
export const stringMap = z
  .record(z.union([z.string(), z.number(), z.boolean()]))
  .default({})
  .transform((values) => {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
      result[key] = String(value);
    }
    return result;
  });

export function formatIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Parse and validate the JSON body of a request
 *
 * @throws RequestBodyError when the body is not JSON or fails the schema
 */
export async function parseBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new RequestBodyError(["Request body must be valid JSON"]);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new RequestBodyError(result.error.issues.map(formatIssue));
  }
  return result.data;
}
