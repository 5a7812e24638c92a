import type { PlatformRules, PlatformRulesProvider } from '../models';

export const GENERIC_RULES: PlatformRules = { max_chars: 2200, hashtags_max: 10, linebreaks_ok: true };

export const DEFAULT_PLATFORM_RULES: Readonly<Record<string, PlatformRules>> = {
  twitter: { max_chars: 280, hashtags_max: 2, linebreaks_ok: false },
  linkedin: { max_chars: 3000, hashtags_max: 5, linebreaks_ok: true },
  whatsapp: { max_chars: 1000, hashtags_max: 3, linebreaks_ok: true },
  email: { max_chars: 5000, hashtags_max: 0, linebreaks_ok: true },
  sms: { max_chars: 160, hashtags_max: 0, linebreaks_ok: false },
  instagram: { max_chars: 2200, hashtags_max: 30, linebreaks_ok: true },
};

export const normalizePlatform = (platform?: string | null) => (platform ?? '').trim().toLowerCase();

export function createPlatformRulesProvider(
  table: Readonly<Record<string, PlatformRules>> = DEFAULT_PLATFORM_RULES,
  fallback: PlatformRules = GENERIC_RULES,
): PlatformRulesProvider {
  return {
    getRules(platform) {
      const key = normalizePlatform(platform);
      return (key && table[key]) || fallback;
    },
  };
}
