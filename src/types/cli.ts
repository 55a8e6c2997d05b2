/**
 * CLI type definitions
 */

/**
 * Parsed command-line options.
 */
export type CliOptions = {
  /** Path to the catalog JSON file */
  programs: string;
  /** Path to the preferences JSON file */
  preferences: string;
  /** Maximum number of recommendations (undefined → configured default) */
  topN?: number;
  smoothIdf: boolean;
  stripAccents: boolean;
};

/**
 * Output sinks used by the CLI.
 *
 * Injected so tests can capture command output in process.
 */
export type CliIo = {
  /** Writes one line of command output (stdout) */
  out: (line: string) => void;
  /** Writes commander --help/--version text as given (stdout) */
  write: (text: string) => void;
  /** Writes commander usage errors (stderr) */
  err: (text: string) => void;
};
