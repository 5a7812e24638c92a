import type {
  Candidate,
  GroundingDocument,
  PlatformRulesProvider,
  ValidationOutcome,
  VibeSpec,
  VibeTemplateProvider,
} from '../models';
import { GROUNDING_TOP_K, type GroundingClient } from '../grounding/client';
import { normalizePlatform } from '../platform/rules';
import { validatePlatform } from '../platform/validate';
import { MESSAGE_MAX_CHARS, buildVibesPrompt } from '../prompts/vibesPrompt';
import { truncateText } from '../text/truncate';
import { pushTrace, type TraceSink } from '../trace';
import { VIBE_TEMPLATES } from '../vibes/templates';
import { LOCAL_TIER_NAME, localCandidate, type GenerationTier } from './tiers';

export type GenerateInput = {
  message: string;
  platform?: string | null;
  userId?: string | null;
  signal?: AbortSignal;
};

export type GenerationResult = {
  candidates: Candidate[];
  /** Name of the tier whose output was accepted. */
  tier: string;
  /** Per-candidate platform validation, aligned with `candidates`; empty without a platform. */
  validations: ValidationOutcome[];
  grounding: GroundingDocument[];
};

export type GenerationOrchestratorDeps = {
  /** External tiers in priority order. Local templates run after the last one fails. */
  tiers: GenerationTier[];
  grounding: GroundingClient;
  templates: VibeTemplateProvider;
  rules: PlatformRulesProvider;
};

export type GenerationOrchestrator = {
  generate(input: GenerateInput, sink?: TraceSink): Promise<GenerationResult>;
};

/** Provided guidance in canonical order; a vibe the provider omits keeps the built-in entry. */
function canonicalVibes(templates: VibeTemplateProvider): VibeSpec[] {
  const provided = new Map(templates.list().map((spec) => [spec.name, spec]));
  return VIBE_TEMPLATES.map((fallback) => provided.get(fallback.name) ?? fallback);
}

export function groundingQuery(message: string, platform?: string | null): string {
  return `${normalizePlatform(platform) || 'generic'} guidance for: ${message}`;
}

export function createGenerationOrchestrator(deps: GenerationOrchestratorDeps): GenerationOrchestrator {
  const vibes = canonicalVibes(deps.templates);

  return {
    async generate(input, sink) {
      const message = truncateText(input.message, MESSAGE_MAX_CHARS);
      const grounding = await deps.grounding.retrieve(
        {
          query: groundingQuery(message, input.platform),
          platform: input.platform,
          userId: input.userId,
          topK: GROUNDING_TOP_K,
          signal: input.signal,
        },
        sink,
      );
      const prompt = buildVibesPrompt({ message, vibes, grounding, topK: GROUNDING_TOP_K });

      let accepted: { tier: string; candidates: Candidate[] } | null = null;
      for (const tier of deps.tiers) {
        const result = await tier.attempt(prompt, { message, signal: input.signal });
        if (result.ok) {
          pushTrace(sink, { gate: 'generation.tier', outcome: 'ok', meta: { tier: tier.name } });
          accepted = { tier: tier.name, candidates: result.value };
          break;
        }
        pushTrace(sink, {
          gate: 'generation.tier',
          outcome: 'fallback',
          reason_code: result.failure.kind,
          meta: { tier: tier.name, detail: result.failure.detail },
        });
      }

      if (!accepted) {
        pushTrace(sink, { gate: 'generation.tier', outcome: 'ok', meta: { tier: LOCAL_TIER_NAME } });
        accepted = { tier: LOCAL_TIER_NAME, candidates: vibes.map((vibe) => localCandidate(vibe, message)) };
      }
      const { tier, candidates } = accepted;

      if (!input.platform) {
        return { candidates, tier, validations: [], grounding };
      }

      const validations = candidates.map((candidate) =>
        validatePlatform(candidate.rewritten_text, input.platform, deps.rules),
      );
      validations.forEach((outcome, index) => {
        if (outcome.issues.length > 0) {
          pushTrace(sink, {
            gate: 'platform.validate',
            outcome: 'ok',
            reason_code: outcome.issues.join(','),
            meta: { vibe: candidates[index]?.vibe },
          });
        }
      });

      return {
        candidates: candidates.map((candidate, index) => ({
          ...candidate,
          rewritten_text: validations[index]?.text ?? candidate.rewritten_text,
        })),
        tier,
        validations,
        grounding,
      };
    },
  };
}
