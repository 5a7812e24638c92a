import { z } from 'zod';
import type { Attempt } from '../models';

const ScoreValueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);
const ScoreListSchema = z.array(ScoreValueSchema);
const ScoreMapSchema = z.record(ScoreValueSchema);
const WrappedScoresSchema = z.object({ scores: z.union([ScoreListSchema, ScoreMapSchema]) });

type ScoreValue = z.infer<typeof ScoreValueSchema>;

/** Lenient numeric read (non-numeric becomes 0), clamped to the 0–10 rubric. */
export function toScore(value: ScoreValue): number {
  let numeric = 0;
  if (typeof value === 'number') numeric = value;
  else if (typeof value === 'boolean') numeric = value ? 1 : 0;
  else if (typeof value === 'string' && value.trim() !== '') numeric = Number(value.trim());
  if (!Number.isFinite(numeric)) return 0;
  return Math.min(10, Math.max(0, numeric));
}

const violation = (detail: string): Attempt<number[]> => ({
  ok: false,
  failure: { kind: 'ranking_contract_violation', detail },
});

/**
 * Map a parsed scoring payload onto `ids`. Preferred shape is an id-keyed object
 * (optionally wrapped in `{ scores }`) covering every id exactly once. A bare
 * array is paired by position and must match the candidate count.
 */
export function readScores(payload: unknown, ids: string[]): Attempt<number[]> {
  const wrapped = WrappedScoresSchema.safeParse(payload);
  const body = wrapped.success ? wrapped.data.scores : payload;

  const list = ScoreListSchema.safeParse(body);
  if (list.success) {
    if (list.data.length !== ids.length) {
      return violation(`expected ${ids.length} scores, got ${list.data.length}`);
    }
    return { ok: true, value: list.data.map(toScore) };
  }

  const map = ScoreMapSchema.safeParse(body);
  if (!map.success) return violation('scores are neither an id map nor a list');

  const keys = Object.keys(map.data);
  const unknown = keys.filter((key) => !ids.includes(key));
  if (unknown.length > 0) return violation(`unknown candidate ids: ${unknown.join(', ')}`);

  const scores: number[] = [];
  for (const id of ids) {
    const value = map.data[id];
    if (value === undefined) return violation(`missing score for ${id}`);
    scores.push(toScore(value));
  }
  return { ok: true, value: scores };
}
