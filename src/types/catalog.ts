/**
 * Program catalog type definitions
 *
 * Input files are parsed as `unknown` and validated into these shapes
 * (see @/utils/inputValidation).
 */

/**
 * One catalog entry.
 *
 * Every field is optional. Absent text fields count as empty strings
 * when building features; absent display fields print a placeholder.
 * Records carry no identity beyond their position in the catalog.
 */
export type ProgramRecord = {
  /** Program display name (e.g., "Morning Yoga") */
  readonly name?: string;
  /** Category label matched against user preferences (case-sensitive) */
  readonly category?: string;
  /** Free-text description */
  readonly notes?: string;
  /** Where the program takes place, display only */
  readonly venue?: string;
};

/**
 * Text fields of a program that feed the feature space, in synthesis order.
 */
export type ProgramTextField = "name" | "category" | "notes";

/**
 * Fields printed for each recommendation.
 */
export type ProgramDisplayField = "name" | "category" | "venue";

/**
 * Validated user preferences.
 *
 * Only membership matters; duplicates are kept as given and
 * collapse during candidate filtering.
 */
export type UserPreferences = {
  preferredCategories: string[];
};
