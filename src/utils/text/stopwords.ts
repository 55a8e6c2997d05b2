/**
 * English stop-word list
 *
 * Loaded once from data/stopwords.english.json and shared read-only.
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import { ENGLISH_STOP_WORDS_PATH } from "@/constants/textNormalization";

let englishStopWords: ReadonlySet<string> | undefined;

/**
 * Error thrown when the bundled stop-word file is unusable.
 */
export class StopWordsLoadError extends Error {
  constructor(message: string) {
    super(`Stop-word list could not be loaded: ${message}`);
    this.name = "StopWordsLoadError";
  }
}

function parseStopWords(raw: unknown): ReadonlySet<string> {
  if (!Array.isArray(raw)) {
    throw new StopWordsLoadError("expected a JSON array of strings");
  }
  const words = new Set<string>();
  raw.forEach((word: unknown, index: number) => {
    if (typeof word !== "string") {
      throw new StopWordsLoadError(`entry [${index}] is not a string`);
    }
    words.add(word.toLowerCase());
  });
  return words;
}

/**
 * Returns the bundled English stop words (lowercase).
 */
export function getEnglishStopWords(): ReadonlySet<string> {
  if (!englishStopWords) {
    const filePath = fileURLToPath(
      new URL(ENGLISH_STOP_WORDS_PATH, import.meta.url),
    );
    englishStopWords = parseStopWords(
      JSON.parse(fs.readFileSync(filePath, "utf-8")),
    );
  }
  return englishStopWords;
}
