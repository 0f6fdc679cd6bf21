import { normaliseKey } from './text';

const NEGATION_PATTERN =
  /\b(?:no|not|never|none|nobody|nothing|nowhere|neither|nor|without|cannot|lacks?|lacking)\b|n't\b/i;

const STOPWORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'but', 'of', 'in', 'on', 'at', 'to', 'for', 'by', 'with', 'from',
  'is', 'are', 'was', 'were', 'be', 'been', 'being', 'has', 'have', 'had', 'do', 'does', 'did',
  'it', 'its', 'this', 'that', 'these', 'those', 'there', 'their', 'they', 'as', 'any', 'all',
  'can', 'could', 'will', 'would', 'may', 'might', 'must', 'shall', 'should', 's', 't',
  'no', 'not', 'never', 'none', 'without', 'cannot', 'nobody', 'nothing', 'nowhere', 'neither', 'nor',
]);

export function isNegated(statement: string): boolean {
  return NEGATION_PATTERN.test(statement.replace(/[’‘]/g, "'"));
}

export function contentWords(statement: string): string[] {
  return normaliseKey(statement)
    .split(' ')
    .filter((word) => word.length > 0 && !STOPWORDS.has(word));
}

export function wordOverlap(a: string, b: string): number {
  const left = new Set(contentWords(a));
  const right = new Set(contentWords(b));
  if (!left.size && !right.size) {
    return 1;
  }
  let shared = 0;
  left.forEach((word) => {
    if (right.has(word)) {
      shared += 1;
    }
  });
  return shared / (left.size + right.size - shared);
}

/** Same subject, different claim: opposite polarity, or too little shared wording to be a restatement. */
export function statementsConflict(existing: string, incoming: string, minimumOverlap = 0.5): boolean {
  if (normaliseKey(existing) === normaliseKey(incoming)) {
    return false;
  }
  if (isNegated(existing) !== isNegated(incoming)) {
    return true;
  }
  return wordOverlap(existing, incoming) < minimumOverlap;
}

export function deriveSubject(statement: string): string {
  const words = contentWords(statement);
  return words.slice(0, 2).join(' ') || normaliseKey(statement);
}

export function toSearchKey(text: string): string {
  return ` ${normaliseKey(text)} `;
}

/** Whole-word phrase lookup against a key built with `toSearchKey`. */
export function containsPhrase(searchKey: string, phrase: string): boolean {
  const key = normaliseKey(phrase);
  return key.length > 0 && searchKey.includes(` ${key} `);
}

const NAME_TITLES = new Set([
  'mr', 'mrs', 'ms', 'miss', 'dr', 'doctor', 'professor', 'sir', 'lady', 'lord', 'dame',
  'inspector', 'detective', 'sergeant', 'constable', 'officer', 'captain', 'commander', 'general',
  'father', 'mother', 'sister', 'brother', 'uncle', 'aunt', 'king', 'queen', 'prince', 'princess',
]);

/**
 * Full name, or its given name or surname once leading titles are set aside, so "Inspector Vale"
 * is found through "Vale" but never through "inspector" alone.
 */
export function mentionsName(searchKey: string, name: string): boolean {
  if (containsPhrase(searchKey, name)) {
    return true;
  }
  const parts = normaliseKey(name).split(' ').filter(Boolean);
  while (parts.length > 1 && NAME_TITLES.has(parts[0])) {
    parts.shift();
  }
  const candidates = parts.length > 1 ? [parts[0], parts[parts.length - 1]] : parts;
  return candidates.some((part) => part.length > 2 && containsPhrase(searchKey, part));
}
