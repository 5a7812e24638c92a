import type { Attempt, Candidate, GenerationService, VibeSpec } from '../models';
import { runWithDeadline } from '../deadline';
import { isUnparsed, parseStructured } from '../parse';
import { validateCandidateRecords } from '../vibes/validate';

export type GenerationPrompt = {
  system: string;
  user: string;
};

export type TierContext = {
  /** Message as it appears in the prompt (already truncated). */
  message: string;
  signal?: AbortSignal;
};

export type GenerationTier = {
  name: string;
  attempt(prompt: GenerationPrompt, context: TierContext): Promise<Attempt<Candidate[]>>;
};

export const DEFAULT_TIER_TIMEOUT_MS = 12_000;
export const DEFAULT_GENERATION_TEMPERATURE = 0.7;

export type ServiceTierOptions = {
  temperature?: number;
  timeoutMs?: number;
};

/** External tier: one call, no retry, output accepted only if it passes the candidate contract. */
export function createServiceTier(service: GenerationService, options?: ServiceTierOptions): GenerationTier {
  const temperature = options?.temperature ?? DEFAULT_GENERATION_TEMPERATURE;
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIER_TIMEOUT_MS;

  return {
    name: service.name,
    async attempt(prompt, context) {
      let raw: string;
      try {
        raw = await runWithDeadline(
          (signal) => service.complete(prompt.system, prompt.user, { temperature, signal }),
          { timeoutMs, signal: context.signal },
        );
      } catch (error) {
        return { ok: false, failure: { kind: 'provider_unavailable', detail: String(error) } };
      }

      const parsed = parseStructured(raw);
      if (isUnparsed(raw, parsed)) {
        return {
          ok: false,
          failure: { kind: 'malformed_response', detail: `unparsable response (${raw.length} chars)` },
        };
      }
      return validateCandidateRecords(parsed);
    },
  };
}

export const LOCAL_TIER_NAME = 'local_templates';

/** Deterministic last-resort rewrite; cannot fail. */
export function localCandidate(vibe: VibeSpec, message: string): Candidate {
  const lowered = vibe.name.toLowerCase();
  return {
    vibe: vibe.name,
    rewritten_text: `[${vibe.name}] ${message}`,
    explanation: `Uses ${lowered} tone cues based on simple template guidance.`,
    use_cases: [`Use when you need a ${lowered} tone.`, 'Useful for quick edits when time is limited.'],
  };
}
