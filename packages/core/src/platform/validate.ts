import type { PlatformRulesProvider, ValidationIssue, ValidationOutcome } from '../models';

// Letters, marks and digits of any script, so #東京 and #café count whole.
const HASHTAG_RE = /(^|\s)#[\p{L}\p{M}\p{N}_]+/gu;

export function countHashtags(text: string): number {
  return text.match(HASHTAG_RE)?.length ?? 0;
}

/**
 * Keeps the first `limit` hashtag tokens and every other token. Tokens are
 * rejoined with single spaces, so original spacing and linebreaks collapse.
 */
function dropExtraHashtags(text: string, limit: number): string {
  let remaining = limit;
  const kept: string[] = [];
  for (const token of text.split(/\s+/).filter(Boolean)) {
    if (token.startsWith('#')) {
      if (remaining <= 0) continue;
      remaining -= 1;
    }
    kept.push(token);
  }
  return kept.join(' ');
}

export function validatePlatform(
  text: string,
  platform: string | null | undefined,
  rulesProvider: PlatformRulesProvider,
): ValidationOutcome {
  const rules = rulesProvider.getRules(platform);
  const issues: ValidationIssue[] = [];
  let fixed = text;

  // Lengths are in code points; a UTF-16 cut could split an emoji.
  const chars = Array.from(fixed);
  if (chars.length > rules.max_chars) {
    fixed = chars.slice(0, Math.max(0, rules.max_chars - 1)).join('');
    issues.push('trimmed_to_max_chars');
  }

  if (countHashtags(fixed) > rules.hashtags_max) {
    fixed = dropExtraHashtags(fixed, rules.hashtags_max);
    issues.push('removed_extra_hashtags');
  }

  if (!rules.linebreaks_ok && fixed.includes('\n')) {
    fixed = fixed.replace(/\n/g, ' ');
    issues.push('removed_linebreaks');
  }

  return { text: fixed, issues, rules };
}
