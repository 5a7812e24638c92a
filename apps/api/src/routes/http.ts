import type { Context } from 'hono';
import type { z } from 'zod';
import type { VibePipeline } from '@vibes/core';
import type { FileGroundingStore } from '../lib/rag/store';
import type { ModerationResult } from '../lib/safety/moderation';

export type RouteHandler = (c: Context) => Promise<Response>;

export type RouteDeps = {
  pipeline: VibePipeline;
  store: Pick<FileGroundingStore, 'seedGuidelines' | 'upsertUserExample'>;
  moderate(text: string): Promise<ModerationResult>;
  /** Attach the per-request trace to responses as `_debug`. */
  debug?: boolean;
};

type BodyResult<T> = { ok: true; data: T } | { ok: false; response: Response };

export async function readJsonBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<BodyResult<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ error: 'invalid_json' }, 400) };
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    return { ok: false, response: c.json({ error: 'invalid_request', issues }, 400) };
  }
  return { ok: true, data: parsed.data };
}
