/**
 * Ranking tunables
 */

/**
 * Number of recommendations returned when neither --top_n
 * nor RECOMMENDER_TOP_N is given.
 */
export const DEFAULT_TOP_N = 5;

/**
 * Environment variable overriding DEFAULT_TOP_N.
 */
export const TOP_N_ENV_VAR = "RECOMMENDER_TOP_N";

/**
 * Note returned when the catalog holds no programs.
 */
export const EMPTY_CATALOG_NOTE = "No programs available.";
