/**
 * Catalog and display constants
 */

/**
 * Printed in place of a missing name, category or venue.
 */
export const DISPLAY_PLACEHOLDER = "unknown";

/**
 * Printed when a run yields no recommendations.
 */
export const NO_RECOMMENDATIONS_MESSAGE = "No recommendations available.";

/**
 * Key holding the program list in the catalog file.
 */
export const PROGRAMS_KEY = "programs";

/**
 * Key holding the category list in the preferences file.
 */
export const PREFERRED_CATEGORIES_KEY = "preferred_categories";
