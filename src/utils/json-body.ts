import type { Context } from "hono";
import type { z } from "zod";

export const INVALID_JSON_BODY_RESPONSE = {
  error: "Invalid request",
  message: "Request body must be valid JSON.",
} as const;

export type ParsedJsonBodyResult<T> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

export async function parseJsonBody<Schema extends z.ZodTypeAny>(
  c: Context,
  schema: Schema,
): Promise<ParsedJsonBodyResult<z.infer<Schema>>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return { ok: false, response: c.json(INVALID_JSON_BODY_RESPONSE, 400) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      response: c.json(
        {
          error: "Invalid request",
          message: "Request body failed validation.",
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        },
        400,
      ),
    };
  }

  return { ok: true, data: parsed.data };
}
