import { Hono } from 'hono';
import { createFeedbackAcceptHandler, createSeedGuidelinesHandler } from './feedback';
import type { RouteDeps, RouteHandler } from './http';
import { createRewriteTopHandler } from './rewriteTop';
import { createRewriteVibesHandler } from './rewriteVibes';

export type { RouteDeps, RouteHandler } from './http';

export function createRoutes(deps: RouteDeps): Record<string, RouteHandler> {
  return {
    '/rewrite_vibes': createRewriteVibesHandler(deps),
    '/rewrite_top': createRewriteTopHandler(deps),
    '/feedback_accept': createFeedbackAcceptHandler(deps),
    '/seed_guidelines': createSeedGuidelinesHandler(deps),
  };
}

/** POST-only JSON API; other methods on a known path answer 405. */
export function createApiApp(deps: RouteDeps): Hono {
  const app = new Hono();

  for (const [path, handler] of Object.entries(createRoutes(deps))) {
    app.post(path, handler);
    app.all(path, (c) => c.json({ error: 'method_not_allowed' }, 405, { Allow: 'POST' }));
  }

  app.notFound((c) => c.json({ error: 'not_found' }, 404));

  // Details go to the log only; the route name doubles as the log tag.
  app.onError((err, c) => {
    console.error(`[${c.req.path.replace(/^\//, '')}] failed`, err.message);
    return c.json({ error: 'internal_error' }, 500);
  });

  return app;
}
