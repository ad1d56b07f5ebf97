/**
 * Lightweight text normalization shared by keyword reranking and the
 * rule-based strategy matcher
 */

const STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "can", "for", "from", "has", "have", "in",
  "into", "is", "it", "its", "of", "on", "or", "our", "that", "the", "their", "this", "to",
  "we", "will", "with", "any", "all", "who", "which", "not", "no", "do", "does", "must", "never",
]);

/**
 * Lowercased alphanumeric words, in order
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Crude suffix stripping so "subscriptions" and "subscription" compare equal
 */
export function stem(word: string): string {
  for (const suffix of ["ations", "ation", "ings", "ing", "ers", "er", "ies", "ied", "es", "ed", "ly", "s"]) {
    if (word.length - suffix.length >= 3 && word.endsWith(suffix)) {
      return word.slice(0, word.length - suffix.length);
    }
  }
  return word;
}

/**
 * Distinct stems of the non-stop-words in a text, in first-seen order
 */
export function significantStems(text: string): string[] {
  const stems = new Set<string>();
  for (const token of tokenize(text)) {
    if (token.length > 1 && !STOP_WORDS.has(token)) {
      stems.add(stem(token));
    }
  }
  return [...stems];
}
