import { readJsonBody, type RouteDeps, type RouteHandler } from './http';
import { FeedbackRequestSchema } from './schemas';

/** POST /feedback_accept: store an accepted rewrite as a personal style example. */
export function createFeedbackAcceptHandler(deps: RouteDeps): RouteHandler {
  return async (c) => {
    const body = await readJsonBody(c, FeedbackRequestSchema);
    if (!body.ok) return body.response;
    const stored = await deps.store.upsertUserExample({
      userId: body.data.user_id,
      message: body.data.message,
      acceptedText: body.data.accepted_text,
      targetTone: body.data.target_tone,
      platform: body.data.platform,
    });
    return c.json({ stored });
  };
}

/** POST /seed_guidelines: idempotent; reports how many guideline docs were new. */
export function createSeedGuidelinesHandler(deps: RouteDeps): RouteHandler {
  return async (c) => {
    const inserted = await deps.store.seedGuidelines();
    return c.json({ inserted });
  };
}
