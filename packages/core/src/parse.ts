const FENCE = '```';

/**
 * Parse provider output as JSON, tolerating a fenced code block.
 * Returns the raw input unchanged when it does not parse; never throws.
 */
export function parseStructured(raw: string): unknown {
  let cleaned = raw.trim();
  if (cleaned.startsWith(FENCE)) {
    const firstBreak = cleaned.indexOf('\n');
    if (firstBreak !== -1) cleaned = cleaned.slice(firstBreak + 1);
    if (cleaned.endsWith(FENCE)) {
      const lastBreak = cleaned.lastIndexOf('\n');
      if (lastBreak !== -1) cleaned = cleaned.slice(0, lastBreak);
    }
  }
  try {
    return JSON.parse(cleaned);
  } catch {
    return raw;
  }
}

/** True when parseStructured gave back the input string, i.e. nothing parsed. */
export function isUnparsed(raw: string, parsed: unknown): parsed is string {
  return typeof parsed === 'string' && parsed === raw;
}
