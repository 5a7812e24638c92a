import type { Hono } from 'hono';
import type { Env } from './lib/config';
import { createAppContext, type AppContext } from './lib/context';
import { createApiApp } from './routes';

export type VibesApp = {
  context: AppContext;
  app: Hono;
};

export function createApp(env: Env = process.env): VibesApp {
  const context = createAppContext(env);
  return {
    context,
    app: createApiApp({ ...context, debug: context.config.debug }),
  };
}
