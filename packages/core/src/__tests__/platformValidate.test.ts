import { describe, expect, it } from 'vitest';
import { DEFAULT_PLATFORM_RULES, GENERIC_RULES, createPlatformRulesProvider } from '../platform/rules';
import { countHashtags, validatePlatform } from '../platform/validate';

const rules = createPlatformRulesProvider();

describe('validatePlatform', () => {
  it('trims text over the limit to max_chars - 1', () => {
    const outcome = validatePlatform('a'.repeat(300), 'twitter', rules);
    expect(outcome.text).toHaveLength(279);
    expect(outcome.issues).toEqual(['trimmed_to_max_chars']);
  });

  it('keeps the first hashtags greedily and rejoins with single spaces', () => {
    const outcome = validatePlatform('Launch day  #one #two #three is here', 'twitter', rules);
    expect(outcome.text).toBe('Launch day #one #two is here');
    expect(outcome.issues).toEqual(['removed_extra_hashtags']);
  });

  it('counts and trims hashtags in any script', () => {
    const outcome = validatePlatform('Trip #東京 #大阪 #京都 #café', 'twitter', rules);
    expect(outcome.text).toBe('Trip #東京 #大阪');
    expect(outcome.issues).toEqual(['removed_extra_hashtags']);
  });

  it('leaves emoji text within the limit untouched', () => {
    const text = '😀'.repeat(100);
    expect(validatePlatform(text, 'sms', rules)).toEqual({ text, issues: [], rules: DEFAULT_PLATFORM_RULES.sms });
  });

  it('trims by character so emoji are never split', () => {
    const outcome = validatePlatform('😀'.repeat(200), 'sms', rules);
    expect(outcome.text).toBe('😀'.repeat(159));
    expect(outcome.issues).toEqual(['trimmed_to_max_chars']);
  });

  it('replaces linebreaks where the platform disallows them', () => {
    const outcome = validatePlatform('Line one\nLine two', 'twitter', rules);
    expect(outcome.text).toBe('Line one Line two');
    expect(outcome.issues).toEqual(['removed_linebreaks']);
  });

  it('collapses linebreaks as a side effect of hashtag trimming', () => {
    const outcome = validatePlatform('Hello\n#team', 'sms', rules);
    expect(outcome.text).toBe('Hello');
    expect(outcome.issues).toEqual(['removed_extra_hashtags']);
  });

  it('falls back to generic rules for unknown or missing platforms', () => {
    expect(validatePlatform('Hi\nthere', 'myspace', rules)).toEqual({
      text: 'Hi\nthere',
      issues: [],
      rules: GENERIC_RULES,
    });
    expect(rules.getRules(null)).toBe(GENERIC_RULES);
  });

  it('normalizes the platform key', () => {
    expect(rules.getRules('  Twitter ')).toEqual(DEFAULT_PLATFORM_RULES.twitter);
  });

  it('keeps every platform within its length and hashtag limits', () => {
    const text = Array.from({ length: 900 }, (_, i) => (i % 3 === 0 ? `#tag${i}` : `word${i}`)).join(' ');
    for (const [platform, platformRules] of Object.entries(DEFAULT_PLATFORM_RULES)) {
      const outcome = validatePlatform(text, platform, rules);
      expect(outcome.text.length).toBeLessThanOrEqual(platformRules.max_chars);
      expect(countHashtags(outcome.text)).toBeLessThanOrEqual(platformRules.hashtags_max);
    }
  });
});

describe('countHashtags', () => {
  it('counts only whitespace- or start-delimited tags', () => {
    expect(countHashtags('#a b #c d#e #')).toBe(2);
  });

  it('counts tags outside ASCII', () => {
    expect(countHashtags('#東京 #café #naïve_2')).toBe(3);
  });
});
