/**
 * CLI run — load inputs, rank, print
 *
 * Exit codes:
 * - 0: completed, including runs with no recommendations
 * - 1: unreadable file, malformed JSON, missing key or bad configuration
 * - commander's code for argument errors (help/version exit 0)
 */

import { CommanderError } from "commander";
import type { CliIo, CliOptions } from "@/types/cli";
import { ProgramCatalog, loadProgramsFile, loadPreferencesFile } from "@/catalog";
import { recommend } from "@/ranking";
import * as logger from "@/logger";
import { createProgram, parseCliOptions } from "./program";
import { resolveDefaultTopN } from "./config";
import { formatRecommendations } from "./printRecommendations";

const defaultIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  write: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

/**
 * Runs the recommender CLI.
 *
 * @param argv - Arguments after the node and script entries
 * @returns Process exit code
 */
export function run(argv: readonly string[], io: CliIo = defaultIo): number {
  const program = createProgram(io);

  let options: CliOptions;
  try {
    options = parseCliOptions(program, argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  try {
    const topN = options.topN ?? resolveDefaultTopN();

    const catalog = new ProgramCatalog();
    for (const record of loadProgramsFile(options.programs)) {
      catalog.add(record);
    }
    const preferences = loadPreferencesFile(options.preferences);

    logger.info("Inputs loaded", {
      programs: catalog.size,
      preferredCategories: preferences.preferredCategories,
      topN,
    });

    const result = recommend(
      catalog.all(),
      preferences.preferredCategories,
      topN,
      {
        smoothIdf: options.smoothIdf,
        stripAccents: options.stripAccents,
      },
    );

    for (const line of formatRecommendations(result)) {
      io.out(line);
    }
    return 0;
  } catch (error) {
    logger.error("Recommendation run failed", {
      error: error instanceof Error ? error.message : String(error),
      name: error instanceof Error ? error.name : undefined,
    });
    return 1;
  }
}
