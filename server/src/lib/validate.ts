import type { Context } from 'hono';
import type { z } from 'zod';

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const MAX_JSON_BODY_BYTES = parsePositiveInt(process.env.MAX_JSON_BODY_BYTES, 200_000);

export type BodyParseResult<T> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

/**
 * Read a JSON request body, enforce a byte limit, and validate it against a
 * Zod schema. An empty body validates as `{}` so all-optional schemas work
 * without one.
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
  maxBytes: number = MAX_JSON_BODY_BYTES,
): Promise<BodyParseResult<z.infer<S>>> {
  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return { ok: false, response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415) };
  }

  const raw = await c.req.text();
  if (Buffer.byteLength(raw, 'utf8') > maxBytes) {
    return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
  }

  let body: unknown = {};
  if (raw.trim()) {
    try {
      body = JSON.parse(raw);
    } catch {
      return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
    }
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, response: c.json({ error: 'Invalid request', details: parsed.error.issues }, 400) };
  }
  return { ok: true, data: parsed.data };
}
