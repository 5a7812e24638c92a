/**
 * Deterministic PII masking applied to user text before it reaches a provider.
 * Regex only; no name detection.
 */

export type MaskResult = {
  masked: string;
  hits: Record<string, number>;
};

type Bucket = {
  key: string;
  pattern: RegExp;
  replacement: string;
};

// Order matters: urls and emails first so their digits never reach the phone/card buckets.
const BUCKETS: Bucket[] = [
  { key: 'url', pattern: /https?:\/\/[^\s]+|www\.[^\s]+/gi, replacement: '[URL]' },
  { key: 'email', pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  { key: 'uuid', pattern: /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, replacement: '[ID]' },
  { key: 'ip', pattern: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, replacement: '[IP]' },
  { key: 'iban', pattern: /\b[A-Z]{2}\d{2}(?:\s?\d{4}){4}\s?\d{0,4}\b/g, replacement: '[IBAN]' },
  { key: 'card', pattern: /\b\d{4}[\s.-]?\d{4}[\s.-]?\d{4}[\s.-]?\d{4}\b/g, replacement: '[CARD]' },
  { key: 'phone', pattern: /\+?\d[\d\s\-()]{7,}\d/g, replacement: '[PHONE]' },
  { key: 'handle', pattern: /(^|\s)@[a-zA-Z0-9_]+/g, replacement: '$1[HANDLE]' },
];

export function maskPiiDetailed(input: string): MaskResult {
  const hits: Record<string, number> = {};
  let text = input;
  for (const { key, pattern, replacement } of BUCKETS) {
    const count = text.match(pattern)?.length ?? 0;
    if (count > 0) {
      hits[key] = count;
      text = text.replace(pattern, replacement);
    }
  }
  return { masked: text, hits };
}

export function maskPii(input: string): string {
  return maskPiiDetailed(input).masked;
}
