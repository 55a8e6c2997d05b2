/**
 * Recommendation output formatting
 */

import type { ProgramDisplayField, ProgramRecord } from "@/types/catalog";
import type { RecommendationResult } from "@/types/ranking";
import {
  DISPLAY_PLACEHOLDER,
  NO_RECOMMENDATIONS_MESSAGE,
} from "@/constants/catalog";

function displayValue(record: ProgramRecord, field: ProgramDisplayField): string {
  return record[field] ?? DISPLAY_PLACEHOLDER;
}

/**
 * Formats one recommended program as an output line.
 *
 * Missing display fields print as "unknown" rather than failing.
 *
 * @example
 * formatRecommendation({ name: "Yoga", category: "fitness", venue: "Gym A" })
 * // "Program Name: Yoga, Category: fitness, Venue: Gym A"
 */
export function formatRecommendation(record: ProgramRecord): string {
  return (
    `Program Name: ${displayValue(record, "name")}, ` +
    `Category: ${displayValue(record, "category")}, ` +
    `Venue: ${displayValue(record, "venue")}`
  );
}

/**
 * Output lines for a ranking result: one per recommendation, or a
 * single notice when there are none.
 */
export function formatRecommendations(result: RecommendationResult): string[] {
  if (result.recommendations.length === 0) {
    return [NO_RECOMMENDATIONS_MESSAGE];
  }
  return result.recommendations.map(formatRecommendation);
}
