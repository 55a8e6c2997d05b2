/**
 * Input validation module
 *
 * Validates the catalog and preferences JSON documents:
 * - Required top-level keys are present and hold arrays
 * - Program entries are objects
 * - Program text fields are strings (numbers/booleans are stringified,
 *   null counts as absent)
 * - Preferred categories are strings
 *
 * Validation is fail-fast: throws on the first problem found.
 */

import type { ProgramRecord, UserPreferences } from "@/types/catalog";
import {
  PROGRAMS_KEY,
  PREFERRED_CATEGORIES_KEY,
} from "@/constants/catalog";

/**
 * Error thrown when an input document has the wrong shape.
 */
export class InputValidationError extends Error {
  constructor(message: string) {
    super(`Input validation failed: ${message}`);
    this.name = "InputValidationError";
  }
}

const PROGRAM_FIELDS = ["name", "category", "notes", "venue"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a required key holds an array.
 *
 * @param doc - Parsed JSON document
 * @param key - Required key
 * @param docName - Document name for error messages (e.g., "programs file")
 * @throws {InputValidationError} If the document is not an object, the key is missing or not an array
 */
function requireArray(doc: unknown, key: string, docName: string): unknown[] {
  if (!isRecord(doc)) {
    throw new InputValidationError(`${docName} must be a JSON object`);
  }
  if (!(key in doc)) {
    throw new InputValidationError(`${docName} is missing key "${key}"`);
  }
  const value = doc[key];
  if (!Array.isArray(value)) {
    throw new InputValidationError(
      `${docName} "${key}" must be an array, got ${value === null ? "null" : typeof value}`,
    );
  }
  return value;
}

/**
 * Normalizes one optional program field.
 *
 * @returns The field as a string, or undefined when absent/null
 * @throws {InputValidationError} If the value is an object or array
 */
function normalizeField(value: unknown, fieldPath: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  throw new InputValidationError(
    `${fieldPath} must be a string, got ${Array.isArray(value) ? "array" : typeof value}`,
  );
}

/**
 * Validates one program entry and returns it as a ProgramRecord.
 *
 * Unknown keys are ignored. Missing fields stay absent.
 */
function validateProgram(entry: unknown, index: number): ProgramRecord {
  const prefix = `${PROGRAMS_KEY}[${index}]`;
  if (!isRecord(entry)) {
    throw new InputValidationError(`${prefix} must be an object`);
  }

  const record: { -readonly [K in keyof ProgramRecord]: ProgramRecord[K] } = {};
  for (const field of PROGRAM_FIELDS) {
    const value = normalizeField(entry[field], `${prefix}.${field}`);
    if (value !== undefined) {
      record[field] = value;
    }
  }
  return record;
}

/**
 * Validates a parsed catalog file.
 *
 * @param raw - Parsed JSON from the --programs file
 * @returns Program records in file order
 * @throws {InputValidationError} With the offending path on failure
 *
 * @example
 * const programs = validateProgramsFile({ programs: [{ name: "Yoga" }] });
 * // [{ name: "Yoga" }]
 */
export function validateProgramsFile(raw: unknown): ProgramRecord[] {
  const entries = requireArray(raw, PROGRAMS_KEY, "programs file");
  return entries.map((entry, index) => validateProgram(entry, index));
}

/**
 * Validates a parsed preferences file.
 *
 * @param raw - Parsed JSON from the --preferences file
 * @throws {InputValidationError} If preferred_categories is missing or holds non-strings
 */
export function validatePreferencesFile(raw: unknown): UserPreferences {
  const categories = requireArray(
    raw,
    PREFERRED_CATEGORIES_KEY,
    "preferences file",
  );
  const preferredCategories: string[] = [];
  categories.forEach((category, index) => {
    if (typeof category !== "string") {
      throw new InputValidationError(
        `${PREFERRED_CATEGORIES_KEY}[${index}] must be a string, got ${category === null ? "null" : typeof category}`,
      );
    }
    preferredCategories.push(category);
  });
  return { preferredCategories };
}
