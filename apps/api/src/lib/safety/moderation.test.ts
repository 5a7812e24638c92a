import { afterEach, describe, expect, it, vi } from 'vitest';
import { mapReason, moderateText } from './moderation';

describe('moderateText', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports a missing client without flagging', async () => {
    expect(await moderateText('hello', null)).toEqual({ flagged: false, reason: 'no_moderation_client' });
  });

  it('passes clean verdicts', async () => {
    const check = vi.fn(async () => ({ flagged: false, categories: { harassment: false } }));
    expect(await moderateText('hello', check)).toEqual({ flagged: false, reason: 'clean' });
    expect(check).toHaveBeenCalledWith('hello');
  });

  it('maps flagged categories to a reason', async () => {
    const check = async () => ({ flagged: true, categories: { harassment: true, violence: false } });
    expect(await moderateText('text', check)).toEqual({ flagged: true, reason: 'hate' });
  });

  it('never throws when the provider fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const check = async () => {
      throw new Error('503');
    };
    expect(await moderateText('text', check)).toEqual({ flagged: false, reason: 'moderation_error' });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('mapReason', () => {
  it('checks self-harm before the broader buckets', () => {
    expect(mapReason({ 'self-harm/intent': true, violence: true })).toBe('self_harm');
    expect(mapReason({ 'sexual/minors': true, 'violence/graphic': true })).toBe('sexual_violence');
    expect(mapReason({ 'illicit/violent': true })).toBe('illegal');
    expect(mapReason({ violence: true })).toBe('violence');
    expect(mapReason({ sexual: false })).toBe('other_flagged');
  });
});
