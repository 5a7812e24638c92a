type ToneCategory = {
  tones: readonly string[];
  matches: (text: string, length: number) => boolean;
};

const containsAny = (keywords: readonly string[]) => (text: string) =>
  keywords.some((keyword) => text.includes(keyword));

const TONE_CATEGORIES: readonly ToneCategory[] = [
  { tones: ['professional', 'formal'], matches: containsAny(['regards', 'sincerely', 'appreciate']) },
  { tones: ['friendly'], matches: containsAny(['thanks', 'excited', 'glad', 'hey']) },
  { tones: ['concise'], matches: (_text, length) => length < 200 },
  { tones: ['persuasive'], matches: containsAny(['benefit', 'impact', 'value', 'recommend']) },
  { tones: ['empathetic'], matches: containsAny(['understand', 'appreciate', 'support', 'sorry']) },
];

export const TONE_BONUS = 0.5;

/** Base score by character count: mid-length messages rank highest. */
export function lengthBucketScore(length: number): number {
  if (length <= 40) return 4.0;
  if (length <= 100) return 7.0;
  if (length <= 350) return 8.5;
  if (length <= 700) return 7.2;
  return 5.5;
}

/**
 * Length bucket plus TONE_BONUS when the target tone is exactly one of a
 * category's names (case-insensitive) and the text matches its cues.
 * "not friendly" or "semi-formal" name no category.
 */
export function heuristicScore(text: string, targetTone: string): number {
  const tone = targetTone.trim().toLowerCase();
  const length = Array.from(text).length;
  const lowered = text.toLowerCase();
  const bonus = TONE_CATEGORIES.reduce(
    (acc, category) =>
      category.tones.includes(tone) && category.matches(lowered, length) ? acc + TONE_BONUS : acc,
    0,
  );
  return lengthBucketScore(length) + bonus;
}
