/**
 * Adapts provider SDKs to the core GenerationService contract.
 * Each service returns the raw completion text; parsing and validation happen in the tiers.
 */

import type OpenAI from 'openai';
import type { GoogleGenAI } from '@google/genai';
import type { CompletionOptions, GenerationService } from '@vibes/core';

export type ChatRequest = {
  model: string;
  system: string;
  user: string;
  temperature: number;
  signal?: AbortSignal;
};

/** One round trip to a chat backend. Resolves with the message text (may be empty). */
export type ChatTransport = (request: ChatRequest) => Promise<string | null | undefined>;

export function openAiTransport(client: OpenAI): ChatTransport {
  return async ({ model, system, user, temperature, signal }) => {
    const completion = await client.chat.completions.create(
      {
        model,
        temperature,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
      },
      { signal },
    );
    return completion.choices?.[0]?.message?.content;
  };
}

export function geminiTransport(client: GoogleGenAI): ChatTransport {
  return async ({ model, system, user, temperature, signal }) => {
    const response = await client.models.generateContent({
      model,
      contents: user,
      config: {
        systemInstruction: system,
        responseMimeType: 'application/json',
        temperature,
        abortSignal: signal,
      },
    });
    return response.text;
  };
}

/**
 * Empty completions throw so the tier records provider_unavailable rather than
 * a parse failure on "".
 */
export function createChatService(name: string, model: string, transport: ChatTransport): GenerationService {
  return {
    name,
    async complete(system: string, user: string, options: CompletionOptions): Promise<string> {
      const content = await transport({
        model,
        system,
        user,
        temperature: options.temperature,
        signal: options.signal,
      });
      const text = content?.trim() ?? '';
      if (!text) throw new Error(`${name}: empty completion`);
      return text;
    },
  };
}
