import { describe, expect, it } from 'vitest';
import { isUnparsed, parseStructured } from '../parse';

describe('parseStructured', () => {
  it('strips a json fence before parsing', () => {
    expect(parseStructured('```json\n[1,2,3]\n```')).toEqual([1, 2, 3]);
  });

  it('returns the input unchanged when it is not json', () => {
    expect(parseStructured('not json')).toBe('not json');
  });

  it('returns the original fenced text, not the stripped text, on failure', () => {
    const raw = '```\nnot json\n```';
    expect(parseStructured(raw)).toBe(raw);
  });

  it('trims surrounding whitespace', () => {
    expect(parseStructured('  {"a": 1}\n')).toEqual({ a: 1 });
  });

  it('accepts an opening fence without a closing one', () => {
    expect(parseStructured('```json\n{"a": 1}')).toEqual({ a: 1 });
  });

  it('leaves a single-line fence alone', () => {
    expect(parseStructured('```json')).toBe('```json');
  });
});

describe('isUnparsed', () => {
  it('detects the passthrough value', () => {
    const raw = 'hello';
    expect(isUnparsed(raw, parseStructured(raw))).toBe(true);
    expect(isUnparsed('"hello"', parseStructured('"hello"'))).toBe(false);
  });
});
