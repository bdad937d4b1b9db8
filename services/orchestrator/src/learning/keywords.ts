import stopwordList from './stopwords.json';

const STOPWORDS = new Set<string>(stopwordList);
const WORD_PATTERN = /\b\w+\b/g;

/** Lower-cased word tokens longer than two characters, stopwords removed, first occurrence kept. */
export function extractKeywords(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.toLowerCase().matchAll(WORD_PATTERN)) {
    const word = match[0];
    if (word.length > 2 && !STOPWORDS.has(word)) {
      seen.add(word);
    }
  }
  return Array.from(seen);
}

export function jaccardSimilarity(left: Iterable<string>, right: Iterable<string>): number {
  const a = new Set(left);
  const b = new Set(right);
  const union = new Set([...a, ...b]);
  if (union.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) {
      shared += 1;
    }
  }
  return shared / union.size;
}
