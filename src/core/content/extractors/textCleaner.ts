/** Collapses whitespace runs (`\s` covers non-breaking spaces too) and trims. */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** First `count` whitespace-separated words of already-normalized text. */
export function firstWords(text: string, count: number): string {
  if (count <= 0) return '';
  return text.split(' ').filter(Boolean).slice(0, count).join(' ');
}

export function truncateChars(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(0, maxChars) : text;
}

export function hasVisibleText(text: string): boolean {
  return /\S/.test(text);
}
