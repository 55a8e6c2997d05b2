/**
 * CLI configuration from the environment
 */

import { DEFAULT_TOP_N, TOP_N_ENV_VAR } from "@/constants/ranking";
import { InputValidationError } from "@/utils/inputValidation";

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Parses an integer argument or setting.
 *
 * @returns The integer, or undefined when `raw` is not an integer
 */
export function parseInteger(raw: string): number | undefined {
  const trimmed = raw.trim();
  return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Default top-N: RECOMMENDER_TOP_N when set, otherwise DEFAULT_TOP_N.
 *
 * @throws {InputValidationError} If RECOMMENDER_TOP_N is set but not an integer
 */
export function resolveDefaultTopN(
  env: NodeJS.ProcessEnv = process.env,
): number {
  const raw = env[TOP_N_ENV_VAR];
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_TOP_N;
  }
  const value = parseInteger(raw);
  if (value === undefined) {
    throw new InputValidationError(
      `${TOP_N_ENV_VAR} must be an integer, got "${raw}"`,
    );
  }
  return value;
}
