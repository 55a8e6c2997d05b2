/**
 * Command-line definition
 */

import { Command, InvalidArgumentError } from "commander";
import type { CliIo, CliOptions } from "@/types/cli";
import { parseInteger } from "./config";

const VERSION = "0.1.0";

type RawOptions = {
  programs: string;
  preferences: string;
  top_n?: number;
  smoothIdf?: boolean;
  stripAccents?: boolean;
};

function parseTopNArgument(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === undefined) {
    throw new InvalidArgumentError("Must be an integer.");
  }
  return parsed;
}

/**
 * Create the CLI program.
 *
 * Commander errors and --help/--version throw a CommanderError
 * instead of exiting the process; output goes through `io`.
 */
export function createProgram(io: CliIo): Command {
  const program = new Command();

  program
    .name("program-recommender")
    .description(
      "Recommend catalog programs similar to your preferred categories",
    )
    .version(VERSION, "-V, --version", "Output the version number")
    .requiredOption("--programs <path>", "Path to program data JSON file")
    .requiredOption(
      "--preferences <path>",
      "Path to user preferences JSON file",
    )
    .option(
      "--top_n <n>",
      "Number of recommended programs to return (default: 5, or RECOMMENDER_TOP_N)",
      parseTopNArgument,
    )
    .option("--smooth-idf", "Use smoothed inverse document frequency")
    .option("--strip-accents", "Fold accented characters before tokenizing")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.write(text),
      writeErr: (text) => io.err(text),
    })
    .addHelpText(
      "after",
      `
Examples:
  $ program-recommender --programs programs.json --preferences prefs.json
  $ program-recommender --programs programs.json --preferences prefs.json --top_n 3
`,
    );

  return program;
}

/**
 * Parse argv (without the node and script entries) into CLI options.
 *
 * @throws {CommanderError} On invalid arguments, --help or --version
 */
export function parseCliOptions(program: Command, argv: readonly string[]): CliOptions {
  program.parse([...argv], { from: "user" });
  const raw = program.opts<RawOptions>();
  return {
    programs: raw.programs,
    preferences: raw.preferences,
    topN: raw.top_n,
    smoothIdf: raw.smoothIdf ?? false,
    stripAccents: raw.stripAccents ?? false,
  };
}
