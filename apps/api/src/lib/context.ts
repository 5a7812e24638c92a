/**
 * Process-wide wiring: reads config once and builds the pipeline and its collaborators.
 */

import {
  combineObservers,
  createTraceCounters,
  createVibePipeline,
  type GenerationService,
  type TraceCounters,
  type VibePipeline,
} from '@vibes/core';
import { getVibesConfig, type Env, type VibesConfig } from './config';
import { createLlmClient, getLlmConfig } from './llm/client';
import { createGeminiClient, getGeminiConfig } from './llm/gemini';
import { createChatService, geminiTransport, openAiTransport } from './llm/services';
import { createConsoleObserver } from './observability';
import { createFileGroundingStore, type FileGroundingStore } from './rag/store';
import { moderateText, openAiModerationCheck, type ModerationCheck, type ModerationResult } from './safety/moderation';

export type AppContext = {
  config: VibesConfig;
  pipeline: VibePipeline;
  store: FileGroundingStore;
  counters: TraceCounters;
  moderate(text: string): Promise<ModerationResult>;
};

export function createAppContext(env: Env = process.env): AppContext {
  const config = getVibesConfig(env);
  const services: GenerationService[] = [];
  let moderation: ModerationCheck | null = null;

  const llm = getLlmConfig(env);
  if (llm) {
    const client = createLlmClient(llm);
    services.push(createChatService(llm.provider, llm.model, openAiTransport(client)));
    // Moderation endpoint exists on OpenAI only.
    if (llm.provider === 'openai') moderation = openAiModerationCheck(client);
  } else {
    console.warn('[config] no primary LLM key, primary tier disabled');
  }

  const gemini = getGeminiConfig(env);
  if (gemini) {
    services.push(createChatService('gemini', gemini.model, geminiTransport(createGeminiClient(gemini))));
  } else {
    console.warn('[config] no Gemini key, secondary tier disabled');
  }

  const store = createFileGroundingStore({ dataDir: config.dataDir });
  const counters = createTraceCounters();

  const pipeline = createVibePipeline({
    generation: services,
    grounding: store,
    observer: combineObservers(createConsoleObserver({ debug: config.debug }), counters),
    options: {
      tierTimeoutMs: config.tierTimeoutMs,
      scoringTimeoutMs: config.scoringTimeoutMs,
      groundingTimeoutMs: config.groundingTimeoutMs,
      generationTemperature: config.generationTemperature,
      scoringTemperature: config.scoringTemperature,
    },
  });

  return {
    config,
    pipeline,
    store,
    counters,
    moderate: (text) => moderateText(text, moderation),
  };
}
