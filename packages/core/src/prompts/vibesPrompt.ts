import type { GroundingDocument, VibeSpec } from '../models';
import { previewText, truncateText } from '../text/truncate';

export const MESSAGE_MAX_CHARS = 2000;
export const GUIDANCE_PREVIEW_CHARS = 180;
export const GROUNDING_PREVIEW_CHARS = 240;

type VibesPromptInput = {
  message: string;
  vibes: readonly VibeSpec[];
  grounding: GroundingDocument[];
  topK: number;
};

export function buildVibesPrompt({ message, vibes, grounding, topK }: VibesPromptInput) {
  const names = vibes.map((vibe) => vibe.name).join(', ');

  const system = `You rewrite short messages in multiple specific tones.
Return a strict JSON array with exactly ${vibes.length} objects, one per vibe, each with keys:
vibe, rewritten_text, explanation, use_cases (array of short strings, at most 4).
The vibe values must be exactly: ${names}, in that order.
Respond with JSON only.`;

  const guidance = vibes
    .map((vibe) => `- ${vibe.name}: ${previewText(vibe.guidance, GUIDANCE_PREVIEW_CHARS)}`)
    .join('\n');

  const excerpts = grounding
    .slice(0, topK)
    .map((doc) => `- ${doc.title}: ${previewText(doc.text, GROUNDING_PREVIEW_CHARS)}`);

  const user = `Rewrite the message into ${vibes.length} vibes using the guidance below, respond with JSON only.

Message: ${truncateText(message, MESSAGE_MAX_CHARS)}

Vibe guidance:
${guidance}
${excerpts.length ? `\nRetrieved guidance:\n${excerpts.join('\n')}\n` : ''}`;

  return { system, user };
}
