import type { VibeName, VibeSpec, VibeTemplateProvider } from '../models';

export const VIBE_ORDER: readonly VibeName[] = [
  'Professional',
  'Friendly',
  'Persuasive',
  'Concise',
  'Empathetic',
];

export const VIBE_TEMPLATES: readonly VibeSpec[] = [
  {
    name: 'Professional',
    guidance:
      'Polished and businesslike. Complete sentences, no slang or emoji, a courteous opening and a clear next step. Keep the original intent and facts; trade casual phrasing for precise, neutral wording.',
  },
  {
    name: 'Friendly',
    guidance:
      'Warm and approachable, like writing to a colleague you like. Contractions are fine, a light exclamation or emoji is allowed when it fits, and the message should feel personal without losing its point.',
  },
  {
    name: 'Persuasive',
    guidance:
      'Lead with the benefit for the reader, back it with one concrete reason, and close with a direct call to action. Confident but not pushy; avoid hype words and exaggerated claims.',
  },
  {
    name: 'Concise',
    guidance:
      'As short as possible while keeping every fact that matters. One or two sentences, no filler, no pleasantries beyond what the context requires. Prefer verbs over nouns and cut hedging.',
  },
  {
    name: 'Empathetic',
    guidance:
      "Acknowledge the reader's situation or feelings first, then make the request or share the news gently. Supportive, patient wording; offer help or flexibility where the message allows it.",
  },
];

export const staticVibeTemplates: VibeTemplateProvider = {
  list: () => VIBE_TEMPLATES,
};

const VIBE_NAMES = new Set<string>(VIBE_ORDER);

export function isVibeName(value: string): value is VibeName {
  return VIBE_NAMES.has(value);
}
