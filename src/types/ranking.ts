/**
 * Ranking type definitions
 *
 * Types for the TF-IDF feature space and the similarity ranker
 * that turns a catalog plus preferred categories into recommendations.
 */

import type { ProgramRecord } from "./catalog";

/**
 * Sparse document vector: vocabulary index → weight.
 *
 * Indices absent from the map have weight 0.
 */
export type SparseVector = Map<number, number>;

/**
 * Options controlling feature space construction.
 */
export type FeatureSpaceOptions = {
  /**
   * Use the smoothed IDF variant ln((1 + N) / (1 + df)) + 1
   * instead of ln(N / df). Default: false
   */
  smoothIdf?: boolean;
  /** Fold diacritics (é → e) before tokenizing. Default: false */
  stripAccents?: boolean;
  /** Terms excluded from the vocabulary. Default: bundled English list */
  stopWords?: ReadonlySet<string>;
};

/**
 * Options accepted by the ranker.
 */
export type RecommendOptions = FeatureSpaceOptions;

/**
 * Best catalog match for one candidate.
 */
export type RecommendationMatch = {
  /** Catalog index of the candidate record */
  candidateIndex: number;
  /** Catalog index of the most similar record (lowest index on ties) */
  matchIndex: number;
  /** Cosine similarity between candidate and match (0-1) */
  score: number;
};

/**
 * Why a ranking produced no recommendations.
 */
export type EmptyReason = "empty_catalog" | "no_candidates" | "non_positive_top_n";

/**
 * Successful ranking.
 *
 * `recommendations[i]` is the record at `matches[i].matchIndex`.
 */
export type RankedRecommendations = {
  kind: "ranked";
  recommendations: ProgramRecord[];
  matches: RecommendationMatch[];
};

/**
 * Ranking that ended without recommendations. Not an error.
 */
export type EmptyRecommendations = {
  kind: "empty";
  reason: EmptyReason;
  /** Human-readable explanation */
  note: string;
  recommendations: [];
};

export type RecommendationResult = RankedRecommendations | EmptyRecommendations;
