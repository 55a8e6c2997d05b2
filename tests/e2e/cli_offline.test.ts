/**
 * E2E test: CLI run against temp input files
 *
 * Runs the full load → rank → print flow in process with captured output.
 * No network, no child processes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { run } from "@/cli/run";
import type { CliIo } from "@/types/cli";
import { createTempFiles, type TempFiles } from "../helpers/tempFiles";
import { sampleCatalog } from "../helpers/programs";

type CapturedIo = CliIo & {
  lines: string[];
  outText: () => string;
  errText: () => string;
};

function captureIo(): CapturedIo {
  const lines: string[] = [];
  const outChunks: string[] = [];
  const errChunks: string[] = [];
  return {
    lines,
    outText: () => outChunks.join(""),
    errText: () => errChunks.join(""),
    out: (line) => lines.push(line),
    write: (text) => outChunks.push(text),
    err: (text) => errChunks.push(text),
  };
}

describe("CLI run", () => {
  let files: TempFiles;
  let programsPath: string;
  let io: CapturedIo;

  const withPreferences = (categories: unknown[]): string =>
    files.writeJson("preferences.json", { preferred_categories: categories });

  beforeEach(() => {
    files = createTempFiles();
    programsPath = files.writeJson("programs.json", {
      programs: sampleCatalog(),
    });
    io = captureIo();
    vi.stubEnv("LOG_LEVEL", "error");
    vi.stubEnv("RECOMMENDER_TOP_N", "");
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    files.cleanup();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("should print recommendations for the preferred categories", () => {
    const code = run(
      ["--programs", programsPath, "--preferences", withPreferences(["fitness"]), "--top_n", "2"],
      io,
    );

    expect(code).toBe(0);
    expect(io.lines).toEqual([
      "Program Name: Yoga, Category: fitness, Venue: Gym A",
      "Program Name: Pilates, Category: fitness, Venue: Gym B",
    ]);
  });

  it("should honor --top_n", () => {
    const code = run(
      ["--programs", programsPath, "--preferences", withPreferences(["fitness"]), "--top_n=1"],
      io,
    );

    expect(code).toBe(0);
    expect(io.lines).toEqual([
      "Program Name: Yoga, Category: fitness, Venue: Gym A",
    ]);
  });

  it("should use RECOMMENDER_TOP_N when --top_n is absent", () => {
    vi.stubEnv("RECOMMENDER_TOP_N", "1");

    const code = run(
      ["--programs", programsPath, "--preferences", withPreferences(["fitness", "games"])],
      io,
    );

    expect(code).toBe(0);
    expect(io.lines).toEqual([
      "Program Name: Yoga, Category: fitness, Venue: Gym A",
    ]);
  });

  it("should default to five recommendations", () => {
    const code = run(
      ["--programs", programsPath, "--preferences", withPreferences(["fitness", "games"])],
      io,
    );

    expect(code).toBe(0);
    expect(io.lines).toHaveLength(3);
  });

  it("should exit 0 with a notice when nothing matches", () => {
    const code = run(
      ["--programs", programsPath, "--preferences", withPreferences(["music"])],
      io,
    );

    expect(code).toBe(0);
    expect(io.lines).toEqual(["No recommendations available."]);
  });

  it("should exit 0 with a notice for --top_n 0", () => {
    const code = run(
      ["--programs", programsPath, "--preferences", withPreferences(["fitness"]), "--top_n=0"],
      io,
    );

    expect(code).toBe(0);
    expect(io.lines).toEqual(["No recommendations available."]);
  });

  it("should exit 0 with a notice for an empty catalog", () => {
    const emptyPath = files.writeJson("empty.json", { programs: [] });

    const code = run(
      ["--programs", emptyPath, "--preferences", withPreferences(["fitness"])],
      io,
    );

    expect(code).toBe(0);
    expect(io.lines).toEqual(["No recommendations available."]);
  });

  it("should print a placeholder for a missing venue", () => {
    const path = files.writeJson("novenue.json", {
      programs: [{ name: "Choir", category: "music", notes: "tuesday rehearsal" }],
    });

    const code = run(
      ["--programs", path, "--preferences", withPreferences(["music"])],
      io,
    );

    expect(code).toBe(0);
    expect(io.lines).toEqual([
      "Program Name: Choir, Category: music, Venue: unknown",
    ]);
  });

  it("should exit 1 without output when a file is missing", () => {
    const code = run(
      ["--programs", files.missing("nope.json"), "--preferences", withPreferences(["fitness"])],
      io,
    );

    expect(code).toBe(1);
    expect(io.lines).toEqual([]);
  });

  it("should exit 1 on malformed JSON", () => {
    const badPath = files.writeText("bad.json", "{ not json");

    const code = run(
      ["--programs", badPath, "--preferences", withPreferences(["fitness"])],
      io,
    );

    expect(code).toBe(1);
    expect(io.lines).toEqual([]);
  });

  it("should exit 1 when preferred_categories is missing", () => {
    const prefsPath = files.writeJson("prefs.json", { categories: ["fitness"] });

    const code = run(["--programs", programsPath, "--preferences", prefsPath], io);

    expect(code).toBe(1);
    expect(io.lines).toEqual([]);
  });

  it("should exit 1 when a required option is missing", () => {
    const code = run(["--programs", programsPath], io);

    expect(code).toBe(1);
    expect(io.errText()).toContain("--preferences <path>");
  });

  it("should exit 1 for a non-integer --top_n", () => {
    const code = run(
      ["--programs", programsPath, "--preferences", withPreferences(["fitness"]), "--top_n", "two"],
      io,
    );

    expect(code).toBe(1);
    expect(io.errText()).toContain("Must be an integer.");
  });

  it("should print --help to stdout and exit 0", () => {
    const code = run(["--help"], io);

    expect(code).toBe(0);
    expect(io.outText()).toContain("--programs <path>");
    expect(io.errText()).toBe("");
    expect(io.lines).toEqual([]);
  });

  it("should print --version to stdout and exit 0", () => {
    const code = run(["--version"], io);

    expect(code).toBe(0);
    expect(io.outText()).toBe("0.1.0\n");
    expect(io.errText()).toBe("");
  });

  describe("weighting flags", () => {
    // Two "Yoga" entries: the second has no notes, so under ln(N / df)
    // every one of its terms weighs 0 and it falls back to index 0.
    const yogaPair = {
      programs: [
        { name: "Yoga", category: "fitness", notes: "evening", venue: "Gym B" },
        { name: "Yoga", category: "fitness", venue: "Gym A" },
      ],
    };

    // "Cafe" and "Café" only become the same document once accents fold.
    const cafes = {
      programs: [
        { name: "Cafe", category: "drinks", venue: "Main St" },
        { name: "Café", category: "drinks", venue: "Corner" },
        { name: "Chess Club", category: "games", notes: "weekly meetup", venue: "Hall C" },
      ],
    };

    it("should match the notes-less entry to the first entry by default", () => {
      const path = files.writeJson("yoga.json", yogaPair);

      const code = run(
        ["--programs", path, "--preferences", withPreferences(["fitness"])],
        io,
      );

      expect(code).toBe(0);
      expect(io.lines).toEqual([
        "Program Name: Yoga, Category: fitness, Venue: Gym B",
        "Program Name: Yoga, Category: fitness, Venue: Gym B",
      ]);
    });

    it("should let each entry match itself with --smooth-idf", () => {
      const path = files.writeJson("yoga.json", yogaPair);

      const code = run(
        ["--programs", path, "--preferences", withPreferences(["fitness"]), "--smooth-idf"],
        io,
      );

      expect(code).toBe(0);
      expect(io.lines).toEqual([
        "Program Name: Yoga, Category: fitness, Venue: Gym B",
        "Program Name: Yoga, Category: fitness, Venue: Gym A",
      ]);
    });

    it("should keep accented and plain names apart by default", () => {
      const path = files.writeJson("cafes.json", cafes);

      const code = run(
        ["--programs", path, "--preferences", withPreferences(["drinks"])],
        io,
      );

      expect(code).toBe(0);
      expect(io.lines).toEqual([
        "Program Name: Cafe, Category: drinks, Venue: Main St",
        "Program Name: Café, Category: drinks, Venue: Corner",
      ]);
    });

    it("should fold accents with --smooth-idf --strip-accents", () => {
      const path = files.writeJson("cafes.json", cafes);

      const code = run(
        [
          "--programs",
          path,
          "--preferences",
          withPreferences(["drinks"]),
          "--smooth-idf",
          "--strip-accents",
        ],
        io,
      );

      expect(code).toBe(0);
      expect(io.lines).toEqual([
        "Program Name: Cafe, Category: drinks, Venue: Main St",
        "Program Name: Cafe, Category: drinks, Venue: Main St",
      ]);
    });
  });
});
