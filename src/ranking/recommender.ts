/**
 * Similarity ranker
 *
 * Recommends catalog programs for a set of preferred categories.
 *
 * Ranking rules:
 * - The feature space is fitted over the whole catalog, once per call
 * - Candidates are records whose category exactly equals a preferred
 *   category (case-sensitive)
 * - Each candidate is compared against every catalog record, itself
 *   included, so a candidate with unique text best-matches itself
 * - Per candidate, the most similar record wins; lowest index on ties
 * - Results follow candidate order, truncated to topN; a record may
 *   appear more than once
 *
 * Empty catalog, no candidates and non-positive topN are normal
 * outcomes: an empty result with an explanatory note, never an error.
 */

import type { ProgramRecord } from "@/types/catalog";
import type {
  EmptyReason,
  EmptyRecommendations,
  RecommendOptions,
  RecommendationMatch,
  RecommendationResult,
} from "@/types/ranking";
import { EMPTY_CATALOG_NOTE } from "@/constants/ranking";
import { FeatureSpace, synthesizeDocument } from "./featureSpace";
import { similarityMatrix, stableArgmax } from "./similarity";
import * as logger from "@/logger";

const log = logger.withContext({ component: "recommender" });

function emptyResult(reason: EmptyReason, note: string): EmptyRecommendations {
  log.info(note, { reason });
  return { kind: "empty", reason, note, recommendations: [] };
}

/**
 * Ranks catalog programs against the preferred categories.
 *
 * Algorithm:
 * 1. Return early on an empty catalog
 * 2. Select candidates by exact category match
 * 3. Return early when nothing matched or topN < 1
 * 4. Fit TF-IDF over every record's name/category/notes text
 * 5. Project candidates into the same space (no refit)
 * 6. Score candidates × catalog by cosine similarity
 * 7. Take each candidate's best match, keep the first topN
 *
 * @param catalog - Records in catalog order
 * @param desiredCategories - Preferred category labels
 * @param topN - Maximum number of recommendations (fractions round down)
 * @returns Ranked recommendations, or an empty result with a note
 *
 * @example
 * const result = recommend(catalog.all(), ["fitness"], 2);
 * if (result.kind === "ranked") {
 *   result.recommendations.forEach((p) => console.log(p.name));
 * }
 */
export function recommend(
  catalog: readonly ProgramRecord[],
  desiredCategories: Iterable<string>,
  topN: number,
  options: RecommendOptions = {},
): RecommendationResult {
  if (catalog.length === 0) {
    return emptyResult("empty_catalog", EMPTY_CATALOG_NOTE);
  }

  const requested = [...desiredCategories];
  const wanted = new Set(requested);

  const candidateIndices: number[] = [];
  catalog.forEach((record, index) => {
    if (record.category !== undefined && wanted.has(record.category)) {
      candidateIndices.push(index);
    }
  });

  log.debug("Matching programs for categories", {
    categories: requested,
    candidates: candidateIndices.map((index) => catalog[index].name ?? null),
  });

  if (candidateIndices.length === 0) {
    return emptyResult(
      "no_candidates",
      `No programs found for the selected categories: ${JSON.stringify(requested)}`,
    );
  }

  const limit = Math.floor(topN);
  if (!(limit > 0)) {
    return emptyResult(
      "non_positive_top_n",
      `top_n must be at least 1 to return recommendations (got ${topN})`,
    );
  }

  const documents = catalog.map(synthesizeDocument);
  const space = FeatureSpace.fit(documents, options);
  log.debug("Feature space fitted", {
    documents: documents.length,
    idf: Object.fromEntries(
      space.vocabulary.map((term) => [term, space.idfOf(term)]),
    ),
  });
  const catalogVectors = space.transformAll(documents);

  // Only candidates that survive truncation need scoring
  const selected = candidateIndices.slice(0, limit);
  const candidateVectors = space.transformAll(
    selected.map((index) => documents[index]),
  );

  const similarities = similarityMatrix(candidateVectors, catalogVectors);

  const matches: RecommendationMatch[] = selected.map((candidateIndex, row) => {
    const matchIndex = stableArgmax(similarities[row]);
    return {
      candidateIndex,
      matchIndex,
      score: similarities[row][matchIndex],
    };
  });

  log.debug("Ranking complete", {
    vocabularySize: space.dimension,
    candidates: candidateIndices.length,
    returned: matches.length,
  });

  return {
    kind: "ranked",
    recommendations: matches.map((match) => catalog[match.matchIndex]),
    matches,
  };
}
