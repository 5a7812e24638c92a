/**
 * POST /rewrite_vibes: tone analysis plus the five vibe rewrites and platform tips.
 * Moderation is informational; the masked message is what reaches providers.
 */

import type { Candidate, TraceEvent } from '@vibes/core';
import { getPlatformTips } from '../lib/platform/tips';
import { maskPii } from '../lib/privacy/redact';
import { readJsonBody, type RouteDeps, type RouteHandler } from './http';
import { RewriteVibesRequestSchema } from './schemas';

export const toVibeItem = ({ vibe, rewritten_text, explanation, use_cases }: Candidate) => ({
  vibe,
  rewritten_text,
  explanation,
  use_cases,
});

export function createRewriteVibesHandler(deps: RouteDeps): RouteHandler {
  return async (c) => {
    const body = await readJsonBody(c, RewriteVibesRequestSchema);
    if (!body.ok) return body.response;
    const { message, platform, user_id } = body.data;

    const moderation = await deps.moderate(message);
    const clean = maskPii(message);
    const trace: TraceEvent[] = [];

    const [tone, generation] = await Promise.all([
      deps.pipeline.analyzeTone(clean, { trace, signal: c.req.raw.signal }),
      deps.pipeline.generate({ message: clean, platform, userId: user_id, signal: c.req.raw.signal }, { trace }),
    ]);

    return c.json({
      original_message: message,
      tone_analysis: { overall_tone: tone.overall_tone, rationale: tone.rationale },
      vibes: generation.candidates.map(toVibeItem),
      platform_tips: getPlatformTips(platform),
      moderation,
      tier: generation.tier,
      ...(deps.debug ? { _debug: { trace } } : {}),
    });
  };
}
