import type { Attempt, Candidate, GenerationService } from '../models';
import { runWithDeadline } from '../deadline';
import { isUnparsed, parseStructured } from '../parse';
import { buildRankPrompt, candidateIds } from '../prompts/rankPrompt';
import { readScores } from './scores';

export type ScoringRequest = {
  candidates: Candidate[];
  message: string;
  targetTone: string;
  platform?: string | null;
  signal?: AbortSignal;
};

export type ScoringTier = {
  name: string;
  /** Scores aligned with `request.candidates`. */
  score(request: ScoringRequest): Promise<Attempt<number[]>>;
};

export const DEFAULT_SCORING_TIMEOUT_MS = 10_000;
export const DEFAULT_SCORING_TEMPERATURE = 0.2;

export function createServiceScorer(
  service: GenerationService,
  options?: { temperature?: number; timeoutMs?: number },
): ScoringTier {
  const temperature = options?.temperature ?? DEFAULT_SCORING_TEMPERATURE;
  const timeoutMs = options?.timeoutMs ?? DEFAULT_SCORING_TIMEOUT_MS;

  return {
    name: service.name,
    async score(request) {
      const ids = candidateIds(request.candidates.length);
      const { system, user } = buildRankPrompt({
        ids,
        texts: request.candidates.map((candidate) => candidate.rewritten_text),
        message: request.message,
        targetTone: request.targetTone,
        platform: request.platform,
      });

      let raw: string;
      try {
        raw = await runWithDeadline((signal) => service.complete(system, user, { temperature, signal }), {
          timeoutMs,
          signal: request.signal,
        });
      } catch (error) {
        return { ok: false, failure: { kind: 'provider_unavailable', detail: String(error) } };
      }

      const parsed = parseStructured(raw);
      if (isUnparsed(raw, parsed)) {
        return { ok: false, failure: { kind: 'malformed_response', detail: 'unparsable scores' } };
      }
      return readScores(parsed, ids);
    },
  };
}
