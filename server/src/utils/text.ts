const SENTENCE_PATTERN = /[^.!?。！？]+(?:[.!?。！？]+["'”’)\]]*|$)/g;

export function normaliseNewlines(content: string): string {
  return content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export function normaliseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}

export function splitSentences(text: string): string[] {
  const normalised = normaliseWhitespace(text);
  if (!normalised) {
    return [];
  }
  const matches = normalised.match(SENTENCE_PATTERN) ?? [normalised];
  return matches.map((sentence) => sentence.trim()).filter(Boolean);
}

export function splitParagraphs(text: string): string[] {
  return normaliseNewlines(text)
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);
}

/**
 * Keeps whole sentences up to `maxChars`. Falls back to a hard cut when even the first sentence is
 * too long, so the result never exceeds the limit.
 */
export function truncateBySentences(text: string, maxChars: number, keepTail = false): string {
  const normalised = normaliseWhitespace(text);
  if (maxChars <= 0 || !normalised) {
    return '';
  }
  if (normalised.length <= maxChars) {
    return normalised;
  }

  const sentences = splitSentences(normalised);
  const ordered = keepTail ? [...sentences].reverse() : sentences;
  const selected: string[] = [];
  let total = 0;

  for (const sentence of ordered) {
    const next = total + sentence.length + (selected.length ? 1 : 0);
    if (next > maxChars) {
      break;
    }
    selected.push(sentence);
    total = next;
  }

  if (!selected.length) {
    return keepTail ? normalised.slice(-maxChars).trim() : normalised.slice(0, maxChars).trim();
  }

  return (keepTail ? selected.reverse() : selected).join(' ');
}

export function truncateWords(text: string, maxWords: number): string {
  const paragraphs = splitParagraphs(text);
  const kept: string[] = [];
  let used = 0;

  for (const paragraph of paragraphs) {
    const words = countWords(paragraph);
    if (used + words <= maxWords) {
      kept.push(paragraph);
      used += words;
      continue;
    }
    const remaining = maxWords - used;
    const sentences = splitSentences(paragraph);
    const partial: string[] = [];
    let partialWords = 0;
    for (const sentence of sentences) {
      const sentenceWords = countWords(sentence);
      if (partialWords + sentenceWords > remaining) {
        break;
      }
      partial.push(sentence);
      partialWords += sentenceWords;
    }
    if (partial.length) {
      kept.push(partial.join(' '));
    }
    break;
  }

  return kept.join('\n\n');
}

export function tailWords(text: string, maxWords: number): string {
  const words = normaliseWhitespace(text).split(' ').filter(Boolean);
  if (words.length <= maxWords) {
    return words.join(' ');
  }
  return `…${words.slice(words.length - maxWords).join(' ')}`;
}

export function normaliseKey(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function slugify(value: string): string {
  return normaliseKey(value).replace(/\s+/g, '-') || 'untitled';
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
