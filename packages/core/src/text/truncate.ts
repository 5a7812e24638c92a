/** Suffix truncation with an ASCII ellipsis. Counts code points; not word-aware. */
export function truncateText(text: string, maxChars: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) return text;
  return chars.slice(0, Math.max(0, maxChars - 3)).join('') + '...';
}

/** Hard cut followed by the marker, used for bounded prompt previews. */
export function previewText(text: string, maxChars: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) return text;
  return `${chars.slice(0, maxChars).join('')}...`;
}
