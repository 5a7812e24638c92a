import { serve } from '@hono/node-server';
import { createApp } from './app';

const { app, context } = createApp();

serve({ fetch: app.fetch, port: context.config.port }, (info) => {
  console.warn(`[server] listening on http://localhost:${info.port}`);
});
