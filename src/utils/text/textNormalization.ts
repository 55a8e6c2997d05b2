/**
 * Text normalization and tokenization utilities
 *
 * Provides deterministic text processing for the TF-IDF feature space.
 * No stemming, lemmatization or language detection.
 */

import { TOKEN_PATTERN } from "@/constants/textNormalization";
import { removeDiacritics } from "@/utils/text/removeDiacritics";

export type TokenizeOptions = {
  /** Fold diacritics before matching tokens. Default: false */
  stripAccents?: boolean;
  /** Tokens dropped from the output (compared after lowercasing) */
  stopWords?: ReadonlySet<string>;
};

/**
 * Normalizes text and splits it into tokens.
 *
 * Steps (applied in order):
 * 1. Lowercase the text
 * 2. Remove diacritics, when stripAccents is set
 * 3. Extract runs of two or more word characters (see TOKEN_PATTERN)
 * 4. Drop stop words
 *
 * @example
 * normalizeToTokens("Yoga fitness morning class")
 * // ["yoga", "fitness", "morning", "class"]
 *
 * normalizeToTokens("Chess-Club: 5 a side!")
 * // ["chess", "club", "side"]
 * // Note: "5" and "a" are single characters and never become tokens
 *
 * normalizeToTokens("the and of", { stopWords: new Set(["the", "and", "of"]) })
 * // []
 */
export function normalizeToTokens(
  text: string,
  options: TokenizeOptions = {},
): string[] {
  const lowercased = text.toLowerCase();
  const normalized = options.stripAccents
    ? removeDiacritics(lowercased)
    : lowercased;

  const tokens: string[] = [];
  for (const match of normalized.matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (options.stopWords?.has(token)) continue;
    tokens.push(token);
  }
  return tokens;
}
