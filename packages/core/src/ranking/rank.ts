import type { Candidate, RankedCandidate } from '../models';
import { pushTrace, type TraceSink } from '../trace';
import { heuristicScore } from './heuristic';
import type { ScoringTier } from './scorers';

export const DEFAULT_TOP_COUNT = 3;
export const MAX_TOP_COUNT = 10;

export type RankInput = {
  candidates: Candidate[];
  message: string;
  targetTone: string;
  platform?: string | null;
  count?: number;
  signal?: AbortSignal;
};

export type RankResult = {
  ranked: RankedCandidate[];
  /** Scorer that produced the scores, or `heuristic`. */
  scorer: string;
};

export function clampCount(count?: number): number {
  const value = count !== undefined && Number.isFinite(count) ? Math.trunc(count) : DEFAULT_TOP_COUNT;
  return Math.min(MAX_TOP_COUNT, Math.max(1, value));
}

/** Sort by score descending; equal scores keep their submitted order. */
export function sortByScore(candidates: RankedCandidate[]): RankedCandidate[] {
  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => b.candidate.score - a.candidate.score || a.index - b.index)
    .map(({ candidate }) => candidate);
}

async function scoreCandidates(
  scorers: ScoringTier[],
  input: RankInput,
  sink?: TraceSink,
): Promise<{ scores: number[]; scorer: string }> {
  for (const scorer of scorers) {
    const result = await scorer.score({
      candidates: input.candidates,
      message: input.message,
      targetTone: input.targetTone,
      platform: input.platform,
      signal: input.signal,
    });
    if (result.ok) {
      pushTrace(sink, { gate: 'ranking.scorer', outcome: 'ok', meta: { scorer: scorer.name } });
      return { scores: result.value, scorer: scorer.name };
    }
    pushTrace(sink, {
      gate: 'ranking.scorer',
      outcome: 'fallback',
      reason_code: result.failure.kind,
      meta: { scorer: scorer.name, detail: result.failure.detail },
    });
  }

  pushTrace(sink, { gate: 'ranking.scorer', outcome: 'ok', meta: { scorer: 'heuristic' } });
  return {
    scores: input.candidates.map((candidate) => heuristicScore(candidate.rewritten_text, input.targetTone)),
    scorer: 'heuristic',
  };
}

export async function rankCandidates(
  scorers: ScoringTier[],
  input: RankInput,
  sink?: TraceSink,
): Promise<RankResult> {
  if (input.candidates.length === 0) return { ranked: [], scorer: 'none' };

  const { scores, scorer } = await scoreCandidates(scorers, input, sink);
  const scored = input.candidates.map((candidate, index) => ({
    ...candidate,
    score: scores[index] ?? heuristicScore(candidate.rewritten_text, input.targetTone),
  }));

  return { ranked: sortByScore(scored).slice(0, clampCount(input.count)), scorer };
}
