/**
 * POST /rewrite_top: generate the five vibes, rank them against `target_tone`,
 * return the best `num_candidates` (1-10, default 3).
 */

import type { TraceEvent } from '@vibes/core';
import { getPlatformTips } from '../lib/platform/tips';
import { maskPii } from '../lib/privacy/redact';
import { readJsonBody, type RouteDeps, type RouteHandler } from './http';
import { RewriteTopRequestSchema } from './schemas';

export function createRewriteTopHandler(deps: RouteDeps): RouteHandler {
  return async (c) => {
    const body = await readJsonBody(c, RewriteTopRequestSchema);
    if (!body.ok) return body.response;
    const { message, platform, user_id, target_tone, num_candidates } = body.data;

    const moderation = await deps.moderate(message);
    const clean = maskPii(message);
    const trace: TraceEvent[] = [];

    const { generation, top, scorer } = await deps.pipeline.rewriteTop(
      {
        message: clean,
        platform,
        userId: user_id,
        targetTone: target_tone,
        count: num_candidates,
        signal: c.req.raw.signal,
      },
      { trace },
    );

    return c.json({
      original_message: clean,
      target_tone,
      platform_tips: getPlatformTips(platform),
      top_rewrites: top,
      moderation,
      tier: generation.tier,
      scorer,
      ...(deps.debug ? { _debug: { trace } } : {}),
    });
  };
}
