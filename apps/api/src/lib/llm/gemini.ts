/**
 * Gemini client for the secondary tier.
 */

import { GoogleGenAI } from '@google/genai';
import type { Env } from '../config';

export const GEMINI_DEFAULT_MODEL = 'gemini-1.5-flash';

export type GeminiConfig = {
  apiKey: string;
  model: string;
};

export function getGeminiConfig(env: Env = process.env): GeminiConfig | null {
  const apiKey = (env.GOOGLE_API_KEY ?? '').trim() || (env.GEMINI_API_KEY ?? '').trim();
  if (!apiKey) return null;
  return { apiKey, model: (env.GEMINI_MODEL ?? '').trim() || GEMINI_DEFAULT_MODEL };
}

export function createGeminiClient(config: GeminiConfig): GoogleGenAI {
  return new GoogleGenAI({ apiKey: config.apiKey });
}
