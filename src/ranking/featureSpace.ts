/**
 * TF-IDF feature space
 *
 * Fits a vocabulary and inverse document frequencies over a set of
 * documents, then projects any document into that fixed space.
 *
 * Weighting:
 * - tf(t, d) = raw count of t in d
 * - idf(t)   = ln(N / df(t))                 (default)
 *            = ln((1 + N) / (1 + df(t))) + 1 (smoothIdf)
 * - vectors are L2-normalized; a document with no weighted terms
 *   yields the empty (zero) vector
 *
 * A FeatureSpace is built per ranking call and never shared.
 */

import type { ProgramRecord, ProgramTextField } from "@/types/catalog";
import type { FeatureSpaceOptions, SparseVector } from "@/types/ranking";
import { DOCUMENT_FIELD_SEPARATOR } from "@/constants/textNormalization";
import { normalizeToTokens, type TokenizeOptions } from "@/utils/text/textNormalization";
import { getEnglishStopWords } from "@/utils/text/stopwords";

const DOCUMENT_FIELDS: readonly ProgramTextField[] = [
  "name",
  "category",
  "notes",
];

/**
 * Builds the document text for a program: name, category and notes
 * joined by a single space, absent fields as empty strings.
 *
 * @example
 * synthesizeDocument({ name: "Yoga", notes: "morning class" })
 * // "Yoga  morning class"
 */
export function synthesizeDocument(record: ProgramRecord): string {
  return DOCUMENT_FIELDS.map((field) => record[field] ?? "").join(
    DOCUMENT_FIELD_SEPARATOR,
  );
}

export class FeatureSpace {
  private readonly termIndex: Map<string, number>;
  private readonly idf: number[];
  private readonly tokenizeOptions: TokenizeOptions;

  private constructor(
    terms: string[],
    idf: number[],
    tokenizeOptions: TokenizeOptions,
  ) {
    this.termIndex = new Map(terms.map((term, index) => [term, index]));
    this.idf = idf;
    this.tokenizeOptions = tokenizeOptions;
  }

  /**
   * Fits vocabulary and IDF weights over `documents`.
   *
   * Vocabulary is sorted so term indices do not depend on document order.
   */
  static fit(
    documents: readonly string[],
    options: FeatureSpaceOptions = {},
  ): FeatureSpace {
    const tokenizeOptions: TokenizeOptions = {
      stripAccents: options.stripAccents ?? false,
      stopWords: options.stopWords ?? getEnglishStopWords(),
    };

    const documentFrequency = new Map<string, number>();
    for (const document of documents) {
      const unique = new Set(normalizeToTokens(document, tokenizeOptions));
      for (const term of unique) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const n = documents.length;
    const terms = [...documentFrequency.keys()].sort();
    const idf = terms.map((term) => {
      const df = documentFrequency.get(term) ?? 0;
      return options.smoothIdf
        ? Math.log((1 + n) / (1 + df)) + 1
        : Math.log(n / df);
    });

    return new FeatureSpace(terms, idf, tokenizeOptions);
  }

  /** Number of terms in the vocabulary */
  get dimension(): number {
    return this.idf.length;
  }

  /** Vocabulary terms in index order */
  get vocabulary(): string[] {
    return [...this.termIndex.keys()];
  }

  /**
   * IDF weight of a term, or undefined when outside the vocabulary.
   */
  idfOf(term: string): number | undefined {
    const index = this.termIndex.get(term);
    return index === undefined ? undefined : this.idf[index];
  }

  /**
   * Projects a document into this space. Terms outside the
   * vocabulary are ignored; the space is never refitted.
   */
  transform(document: string): SparseVector {
    const counts = new Map<number, number>();
    for (const token of normalizeToTokens(document, this.tokenizeOptions)) {
      const index = this.termIndex.get(token);
      if (index === undefined) continue;
      counts.set(index, (counts.get(index) ?? 0) + 1);
    }

    const weighted: SparseVector = new Map();
    let squaredNorm = 0;
    for (const [index, tf] of counts) {
      const weight = tf * this.idf[index];
      if (weight === 0) continue;
      weighted.set(index, weight);
      squaredNorm += weight * weight;
    }

    if (squaredNorm === 0) return weighted;

    const norm = Math.sqrt(squaredNorm);
    for (const [index, weight] of weighted) {
      weighted.set(index, weight / norm);
    }
    return weighted;
  }

  transformAll(documents: readonly string[]): SparseVector[] {
    return documents.map((document) => this.transform(document));
  }
}
