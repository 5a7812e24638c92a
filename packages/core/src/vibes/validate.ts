import type { Attempt, Candidate, VibeName } from '../models';
import { CandidateListSchema, MAX_USE_CASES, type CandidateRecord } from './schema';
import { VIBE_ORDER, isVibeName } from './templates';

const describeIssues = (issues: { path: (string | number)[]; message: string }[]) =>
  issues
    .slice(0, 3)
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

const toCandidate = (record: CandidateRecord, vibe: VibeName): Candidate => ({
  vibe,
  rewritten_text: record.rewritten_text,
  explanation: record.explanation,
  use_cases: record.use_cases.slice(0, MAX_USE_CASES),
});

/**
 * Accept a parsed provider payload only if it is exactly five well-formed records
 * covering every canonical vibe once. Output is re-keyed into VIBE_ORDER by label,
 * not by position.
 */
export function validateCandidateRecords(payload: unknown): Attempt<Candidate[]> {
  const parsed = CandidateListSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      failure: { kind: 'contract_violation', detail: describeIssues(parsed.error.issues) },
    };
  }

  const byVibe = new Map<VibeName, CandidateRecord>();
  for (const record of parsed.data) {
    const label = record.vibe.trim();
    if (!isVibeName(label)) {
      return { ok: false, failure: { kind: 'contract_violation', detail: `unknown vibe "${label}"` } };
    }
    if (byVibe.has(label)) {
      return { ok: false, failure: { kind: 'contract_violation', detail: `duplicate vibe "${label}"` } };
    }
    byVibe.set(label, record);
  }

  const ordered: Candidate[] = [];
  for (const vibe of VIBE_ORDER) {
    const record = byVibe.get(vibe);
    if (!record) {
      return { ok: false, failure: { kind: 'contract_violation', detail: `missing vibe "${vibe}"` } };
    }
    ordered.push(toCandidate(record, vibe));
  }
  return { ok: true, value: ordered };
}
