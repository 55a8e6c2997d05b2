/**
 * Text normalization constants
 *
 * These parameters control the deterministic tokenization used
 * when building the TF-IDF feature space.
 */

/**
 * Matches one token: a run of two or more word characters.
 *
 * Word characters are Unicode letters, digits and underscore.
 * Single-character runs ("a", "5") never become tokens.
 */
export const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Separator placed between name, category and notes when
 * synthesizing a program's document text.
 */
export const DOCUMENT_FIELD_SEPARATOR = " ";

/**
 * Bundled English stop-word list, relative to src/utils/text/.
 */
export const ENGLISH_STOP_WORDS_PATH = "../../../data/stopwords.english.json";
