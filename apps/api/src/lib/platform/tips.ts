import { normalizePlatform } from '@vibes/core';

export type PlatformTips = {
  platform: string;
  tips: string;
};

const PLATFORM_TIPS: Record<string, string> = {
  whatsapp: "Keep it short, use line breaks for readability. Emojis help convey tone, but don't overuse.",
  linkedin: 'Stay professional, avoid slang, include a clear ask, and keep paragraphs short.',
  email: 'Use a clear subject, polite greeting, one key ask, and a short signature block.',
  twitter: 'Be concise and action-oriented; consider a thread for longer thoughts.',
  sms: 'Very concise, one clear ask, avoid links unless necessary.',
};

export const GENERIC_TIP = 'Adapt tone to the audience; keep it clear, short, and respectful.';
export const UNKNOWN_PLATFORM_TIP = 'No specific guidance found; keep it concise and audience-appropriate.';

export function getPlatformTips(platform?: string | null): PlatformTips {
  const key = normalizePlatform(platform);
  if (!key) return { platform: 'generic', tips: GENERIC_TIP };
  return { platform: key, tips: PLATFORM_TIPS[key] ?? UNKNOWN_PLATFORM_TIP };
}
