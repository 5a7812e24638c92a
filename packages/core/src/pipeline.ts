import type {
  GenerationService,
  GroundingStore,
  PlatformRulesProvider,
  RankedCandidate,
  VibeTemplateProvider,
} from './models';
import { createGroundingClient } from './grounding/client';
import {
  createGenerationOrchestrator,
  type GenerateInput,
  type GenerationResult,
} from './generation/orchestrator';
import { createServiceTier } from './generation/tiers';
import { createPlatformRulesProvider } from './platform/rules';
import { rankCandidates, type RankInput, type RankResult } from './ranking/rank';
import { createServiceScorer } from './ranking/scorers';
import { analyzeTone, type ToneAnalysis } from './tone/analyze';
import type { PipelineObserver, TraceEvent, TraceSink } from './trace';
import { staticVibeTemplates } from './vibes/templates';

export type VibePipelineOptions = {
  tierTimeoutMs?: number;
  scoringTimeoutMs?: number;
  groundingTimeoutMs?: number;
  generationTemperature?: number;
  scoringTemperature?: number;
};

export type VibePipelineDeps = {
  /** Generation services, highest priority first (primary, secondary). */
  generation: GenerationService[];
  /** Scoring services; defaults to the generation services. */
  scoring?: GenerationService[];
  grounding?: GroundingStore | null;
  rules?: PlatformRulesProvider;
  templates?: VibeTemplateProvider;
  observer?: PipelineObserver;
  options?: VibePipelineOptions;
};

export type CallOptions = {
  trace?: TraceEvent[];
};

export type RewriteTopInput = GenerateInput & {
  targetTone: string;
  count?: number;
};

export type RewriteTopResult = {
  generation: GenerationResult;
  top: RankedCandidate[];
  scorer: string;
};

export type VibePipeline = {
  generate(input: GenerateInput, options?: CallOptions): Promise<GenerationResult>;
  rank(input: RankInput, options?: CallOptions): Promise<RankResult>;
  rewriteTop(input: RewriteTopInput, options?: CallOptions): Promise<RewriteTopResult>;
  analyzeTone(message: string, options?: CallOptions & { signal?: AbortSignal }): Promise<ToneAnalysis>;
};

/**
 * Wires the injected collaborators into the generation and ranking chains.
 * Built once per process; each call gets its own trace sink.
 */
export function createVibePipeline(deps: VibePipelineDeps): VibePipeline {
  const options = deps.options ?? {};
  const scoringServices = deps.scoring ?? deps.generation;

  const orchestrator = createGenerationOrchestrator({
    tiers: deps.generation.map((service) =>
      createServiceTier(service, {
        temperature: options.generationTemperature,
        timeoutMs: options.tierTimeoutMs,
      }),
    ),
    grounding: createGroundingClient(deps.grounding, { timeoutMs: options.groundingTimeoutMs }),
    templates: deps.templates ?? staticVibeTemplates,
    rules: deps.rules ?? createPlatformRulesProvider(),
  });

  const scorers = scoringServices.map((service) =>
    createServiceScorer(service, {
      temperature: options.scoringTemperature,
      timeoutMs: options.scoringTimeoutMs,
    }),
  );

  const sinkFor = (callOptions?: CallOptions): TraceSink => ({
    trace: callOptions?.trace,
    observer: deps.observer,
  });

  return {
    generate(input, callOptions) {
      return orchestrator.generate(input, sinkFor(callOptions));
    },

    rank(input, callOptions) {
      return rankCandidates(scorers, input, sinkFor(callOptions));
    },

    async rewriteTop(input, callOptions) {
      const sink = sinkFor(callOptions);
      const generation = await orchestrator.generate(input, sink);
      const { ranked, scorer } = await rankCandidates(
        scorers,
        {
          candidates: generation.candidates,
          message: input.message,
          targetTone: input.targetTone,
          platform: input.platform,
          count: input.count,
          signal: input.signal,
        },
        sink,
      );
      return { generation, top: ranked, scorer };
    },

    analyzeTone(message, callOptions) {
      return analyzeTone(message, deps.generation, {
        timeoutMs: options.tierTimeoutMs,
        signal: callOptions?.signal,
        sink: sinkFor(callOptions),
      });
    },
  };
}
