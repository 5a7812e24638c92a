import type OpenAI from 'openai';

export type ModerationReason =
  | 'clean'
  | 'self_harm'
  | 'violence'
  | 'sexual_violence'
  | 'hate'
  | 'illegal'
  | 'other_flagged'
  | 'no_moderation_client'
  | 'moderation_error';

/** Informational only: a flagged message is still rewritten. */
export type ModerationResult = {
  flagged: boolean;
  reason: ModerationReason;
};

type ModerationCategoryMap = Record<string, boolean>;

export type ModerationVerdict = {
  flagged: boolean;
  categories: ModerationCategoryMap;
};

export type ModerationCheck = (input: string) => Promise<ModerationVerdict>;

const MODEL = 'omni-moderation-latest';

const hasAnyKeyContaining = (categories: ModerationCategoryMap, needle: string) =>
  Object.keys(categories).some((key) => key.includes(needle) && categories[key]);

export function mapReason(categories: ModerationCategoryMap): ModerationReason {
  if (hasAnyKeyContaining(categories, 'self-harm') || hasAnyKeyContaining(categories, 'self_harm')) {
    return 'self_harm';
  }
  if (hasAnyKeyContaining(categories, 'sexual') && hasAnyKeyContaining(categories, 'violence')) {
    return 'sexual_violence';
  }
  if (hasAnyKeyContaining(categories, 'hate') || hasAnyKeyContaining(categories, 'harassment')) {
    return 'hate';
  }
  if (hasAnyKeyContaining(categories, 'illicit') || hasAnyKeyContaining(categories, 'illegal')) {
    return 'illegal';
  }
  if (hasAnyKeyContaining(categories, 'violence') || hasAnyKeyContaining(categories, 'threat')) {
    return 'violence';
  }
  return 'other_flagged';
}

export function openAiModerationCheck(client: OpenAI): ModerationCheck {
  return async (input) => {
    const response = await client.moderations.create({ model: MODEL, input });
    const result = response.results?.[0];
    const categories: ModerationCategoryMap = {};
    for (const [key, value] of Object.entries(result?.categories ?? {})) {
      categories[key] = value === true;
    }
    return { flagged: Boolean(result?.flagged), categories };
  };
}

export async function moderateText(text: string, check: ModerationCheck | null): Promise<ModerationResult> {
  if (!check) {
    return { flagged: false, reason: 'no_moderation_client' };
  }
  try {
    const verdict = await check(text);
    const anyCategory = Object.values(verdict.categories).some(Boolean);
    if (!verdict.flagged && !anyCategory) return { flagged: false, reason: 'clean' };
    return { flagged: true, reason: mapReason(verdict.categories) };
  } catch (error) {
    console.warn('[moderation] request failed, skipping', error);
    return { flagged: false, reason: 'moderation_error' };
  }
}
