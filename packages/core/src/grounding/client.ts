import { runWithDeadline } from '../deadline';
import type { GroundingDocument, GroundingQuery, GroundingStore } from '../models';
import { pushTrace, type TraceSink } from '../trace';

export const GROUNDING_TOP_K = 5;
const DEFAULT_TIMEOUT_MS = 2_000;

export type GroundingClient = {
  retrieve(query: GroundingQuery, sink?: TraceSink): Promise<GroundingDocument[]>;
};

const byRelevance = (a: GroundingDocument, b: GroundingDocument) => b.relevance - a.relevance;

/**
 * Best-effort wrapper around a GroundingStore. Store errors, timeouts and
 * request cancellation resolve to an empty list.
 */
export function createGroundingClient(
  store: GroundingStore | null | undefined,
  options?: { timeoutMs?: number },
): GroundingClient {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    async retrieve(query, sink) {
      if (!store || query.topK <= 0) return [];

      try {
        const docs = await runWithDeadline((signal) => store.retrieve({ ...query, signal }), {
          timeoutMs,
          signal: query.signal,
        });
        const top = [...docs].sort(byRelevance).slice(0, query.topK);
        pushTrace(sink, { gate: 'grounding', outcome: 'ok', meta: { count: top.length } });
        return top;
      } catch (error) {
        pushTrace(sink, {
          gate: 'grounding',
          outcome: 'failed',
          reason_code: 'grounding_failure',
          meta: { error: String(error) },
        });
        return [];
      }
    },
  };
}
