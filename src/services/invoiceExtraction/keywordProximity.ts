export type MatchSpan = {
  start: number;
  /** Exclusive */
  end: number;
};

export type KeywordProximityFilter = {
  windowChars: number;
  /** Compared against the lower-cased window. */
  keywords: readonly string[];
};

export function contextWindow(text: string, span: MatchSpan, windowChars: number): string {
  const from = Math.max(0, span.start - windowChars);
  const to = Math.min(text.length, span.end + windowChars);
  return text.slice(from, to);
}

export function isNearKeyword(text: string, span: MatchSpan, filter: KeywordProximityFilter): boolean {
  const window = contextWindow(text, span, filter.windowChars).toLowerCase();
  return filter.keywords.some((k) => window.includes(k.toLowerCase()));
}
