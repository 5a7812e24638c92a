/**
 * OpenAI-compatible client factory for the primary tier. Supports OpenAI and
 * Qwen (OpenAI-compatible baseURL). API keys come from env only.
 */

import OpenAI from 'openai';
import type { Env } from '../config';

export type LlmProvider = 'openai' | 'qwen';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';
export const QWEN_DEFAULT_BASE_URL = 'https://dashscope-intl.aliyuncs.com/compatible-mode/v1';
export const QWEN_DEFAULT_MODEL = 'qwen-max-2025-01-25';

export type LlmConfig = {
  provider: LlmProvider;
  apiKey: string;
  baseUrl: string | undefined;
  model: string;
};

const read = (env: Env, key: string) => (env[key] ?? '').trim();

/** True if model string looks like an OpenAI model (gpt-*, o1, o*). */
function looksLikeOpenAiModel(model: string): boolean {
  const m = model.toLowerCase();
  return m.startsWith('gpt-') || m.startsWith('o1') || /^o\d/.test(m);
}

/**
 * Resolve provider, key, baseUrl and model from provider-scoped env.
 * OpenAI never gets LLM_BASE_URL (only OPENAI_BASE_URL). Qwen uses QWEN_* then LLM_*.
 * If qwen would get a gpt-* model, it is overridden to QWEN_DEFAULT_MODEL.
 * Returns null when the chosen provider has no API key.
 */
export function getLlmConfig(env: Env = process.env): LlmConfig | null {
  const provider: LlmProvider = read(env, 'LLM_PROVIDER') === 'qwen' ? 'qwen' : 'openai';

  if (provider === 'openai') {
    const apiKey = read(env, 'OPENAI_API_KEY');
    if (!apiKey) return null;
    return {
      provider,
      apiKey,
      baseUrl: read(env, 'OPENAI_BASE_URL') || undefined,
      model: read(env, 'OPENAI_CHAT_MODEL') || OPENAI_DEFAULT_MODEL,
    };
  }

  const apiKey = read(env, 'QWEN_API_KEY') || read(env, 'LLM_API_KEY');
  if (!apiKey) return null;
  const model = read(env, 'QWEN_CHAT_MODEL') || read(env, 'LLM_CHAT_MODEL') || QWEN_DEFAULT_MODEL;
  return {
    provider,
    apiKey,
    baseUrl: read(env, 'QWEN_BASE_URL') || read(env, 'LLM_BASE_URL') || QWEN_DEFAULT_BASE_URL,
    model: looksLikeOpenAiModel(model) ? QWEN_DEFAULT_MODEL : model,
  };
}

export function createLlmClient(config: LlmConfig): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    maxRetries: 0,
  });
}
