import type { PipelineObserver } from '@vibes/core';

type Logger = Pick<Console, 'warn'>;

/**
 * Prints fallbacks and failures as `[gate] outcome { ... }`; successes only in debug.
 */
export function createConsoleObserver(options?: { debug?: boolean; logger?: Logger }): PipelineObserver {
  const debug = options?.debug ?? false;
  const logger = options?.logger ?? console;
  return {
    onEvent(event) {
      if (event.outcome === 'ok' && !debug) return;
      logger.warn(`[${event.gate}]`, event.outcome, {
        ...(event.reason_code ? { reason_code: event.reason_code } : {}),
        ...event.meta,
      });
    },
  };
}
