/**
 * Input file loading
 *
 * Reads the catalog and preferences JSON files and validates them.
 * Fail-fast: any read, parse or validation error throws.
 */

import * as fs from "fs";
import * as path from "path";
import type { ProgramRecord, UserPreferences } from "@/types/catalog";
import {
  validateProgramsFile,
  validatePreferencesFile,
  InputValidationError,
} from "@/utils/inputValidation";

/**
 * Error thrown when an input file cannot be read.
 */
export class InputFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read input file "${filePath}": ${reason}`);
    this.name = "InputFileError";
    this.filePath = filePath;
  }
}

/**
 * Reads and parses a JSON file.
 *
 * @param filePath - Path, resolved against the working directory
 * @throws {InputFileError} If the file cannot be read
 * @throws {InputValidationError} If the content is not valid JSON
 */
function readJsonFile(filePath: string): unknown {
  const resolved = path.resolve(process.cwd(), filePath);

  let content: string;
  try {
    content = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new InputFileError(filePath, err);
  }

  try {
    return JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputValidationError(`"${filePath}" is not valid JSON: ${reason}`);
  }
}

/**
 * Loads program records from a catalog file.
 *
 * Steps:
 * 1. Read file
 * 2. Parse JSON
 * 3. Validate shape and normalize fields
 *
 * @throws {InputFileError} If the file cannot be read
 * @throws {InputValidationError} If JSON is malformed or "programs" is missing
 *
 * @example
 * const programs = loadProgramsFile("data/programs.json");
 * console.log(`Loaded ${programs.length} programs`);
 */
export function loadProgramsFile(filePath: string): ProgramRecord[] {
  return validateProgramsFile(readJsonFile(filePath));
}

/**
 * Loads user preferences from a preferences file.
 *
 * @throws {InputFileError} If the file cannot be read
 * @throws {InputValidationError} If JSON is malformed or "preferred_categories" is missing
 */
export function loadPreferencesFile(filePath: string): UserPreferences {
  return validatePreferencesFile(readJsonFile(filePath));
}
