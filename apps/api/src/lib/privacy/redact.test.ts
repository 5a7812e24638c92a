import { describe, expect, it } from 'vitest';
import { maskPii, maskPiiDetailed } from './redact';

describe('maskPii', () => {
  it('masks emails and phone numbers', () => {
    const result = maskPiiDetailed('Mail me at jane.doe@example.com or call +1 (555) 123-4567');
    expect(result.masked).toBe('Mail me at [EMAIL] or call [PHONE]');
    expect(result.hits).toEqual({ email: 1, phone: 1 });
  });

  it('masks urls before their digits reach other buckets', () => {
    expect(maskPii('See https://example.com/page?id=42 today')).toBe('See [URL] today');
  });

  it('masks card numbers and handles', () => {
    expect(maskPii('card 4111 1111 1111 1111 expired')).toBe('card [CARD] expired');
    expect(maskPii('ping @sam_k about it')).toBe('ping [HANDLE] about it');
  });

  it('leaves ordinary text alone', () => {
    const result = maskPiiDetailed('Meeting moved to 3pm, room 12');
    expect(result.masked).toBe('Meeting moved to 3pm, room 12');
    expect(result.hits).toEqual({});
  });
});
