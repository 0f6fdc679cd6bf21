const CJK_PATTERN = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af]/g;

/**
 * Character-class estimate: CJK characters count about half a token, everything else a quarter.
 * Monotonic in text length, which the context builder relies on when trimming.
 */
export function estimateTokens(text: string): number {
  if (!text) {
    return 0;
  }
  const cjk = (text.match(CJK_PATTERN) ?? []).length;
  const other = text.length - cjk;
  return Math.ceil(cjk * 0.5 + other * 0.25);
}

export function tokensToChars(tokens: number): number {
  return Math.max(0, Math.floor(tokens * 4));
}

export function wordsToTokens(words: number): number {
  return Math.ceil(words * 1.4);
}
