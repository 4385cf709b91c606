import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parseCount, parseJobs, parseScore } from "../../src/cli/arg-parsers.js";
import { resolveColor, runSearchCommand } from "../../src/cli/search-command.js";
import { resolveSearchConfig } from "../../src/config/config-loader.js";

const MEMORY_MESSAGE =
  "Memory: 20.8G (min: 250M peak: 27G swap: 2.7G swap peak: 6.7G)";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "msgtrace-cli-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("search command", () => {
  it("prints the matching statement", async () => {
    await fs.writeFile(
      path.join(tempDir, "report.c"),
      'printf("min: %s swap peak: %d", x, y);\n',
      "utf8",
    );

    const result = await runSearchCommand(
      {
        message: MEMORY_MESSAGE,
        target: tempDir,
        config: resolveSearchConfig({ score: 1 }),
      },
      "0.1.0",
    );

    expect(result.filesScanned).toBe(1);
    expect(result.candidates).toHaveLength(1);
    expect(result.output.split("\n")).toEqual([
      `File: ${path.join(tempDir, "report.c")}  Line: 1  Type: string  Score: 11.4`,
      'printf("min: %s swap peak: %d", x, y); <== match',
    ]);
  });

  it("sorts candidates by score when asked", async () => {
    await fs.writeFile(
      path.join(tempDir, "a.py"),
      ['log("disk")', 'log("disk full now")'].join("\n"),
      "utf8",
    );

    const result = await runSearchCommand(
      {
        message: "disk full now",
        target: tempDir,
        config: resolveSearchConfig({ score: 1, sort: true }),
      },
      "0.1.0",
    );

    expect(result.candidates.map((candidate) => candidate.line)).toEqual([2, 1]);
  });

  it("writes a JSON report", async () => {
    await fs.writeFile(
      path.join(tempDir, "app.js"),
      "throw new Error('disk full');\n",
      "utf8",
    );

    const result = await runSearchCommand(
      {
        message: "Error: disk full",
        target: tempDir,
        config: resolveSearchConfig({ format: "json" }),
      },
      "0.1.0",
    );

    const parsed = JSON.parse(result.output) as {
      summary: { files_scanned: number; candidates: number };
      candidates: Array<{ file: string; line: number; content: string }>;
    };
    expect(parsed.summary).toEqual({ files_scanned: 1, candidates: 1 });
    expect(parsed.candidates[0]).toMatchObject({
      file: path.join(tempDir, "app.js"),
      line: 1,
      content: "disk full",
    });
  });

  it("returns empty output when nothing qualifies", async () => {
    await fs.writeFile(path.join(tempDir, "main.c"), 'puts("hello");\n', "utf8");

    const result = await runSearchCommand(
      {
        message: "disk full",
        target: tempDir,
        config: resolveSearchConfig({ score: 1 }),
      },
      "0.1.0",
    );

    expect(result.candidates).toEqual([]);
    expect(result.output).toBe("");
  });

  it("emits debug lines through the hook", async () => {
    await fs.writeFile(path.join(tempDir, "main.c"), 'puts("disk full");\n', "utf8");
    const messages: string[] = [];

    await runSearchCommand(
      {
        message: "disk full",
        target: tempDir,
        config: resolveSearchConfig(),
        onDebug: (message) => messages.push(message),
      },
      "0.1.0",
    );

    expect(messages[0]).toBe('Tokenized message: ["disk"," ","full"]');
    expect(messages[1]).toBe("Found 1 candidate files.");
    expect(messages.at(-1)).toBe("Total candidates found: 1");
  });

  it("fails for a missing search root", async () => {
    await expect(
      runSearchCommand(
        {
          message: "disk full",
          target: path.join(tempDir, "missing"),
          config: resolveSearchConfig(),
        },
        "0.1.0",
      ),
    ).rejects.toThrow("Search root does not exist");
  });
});

describe("color resolution", () => {
  it("follows the terminal in auto mode", () => {
    expect(resolveColor(resolveSearchConfig(), true)).toBe(true);
    expect(resolveColor(resolveSearchConfig(), false)).toBe(false);
    expect(resolveColor(resolveSearchConfig({ color: "always" }), false)).toBe(true);
    expect(resolveColor(resolveSearchConfig({ color: "never" }), true)).toBe(false);
  });
});

describe("option parsers", () => {
  it("accepts non-negative score thresholds", () => {
    expect(parseScore("0")).toBe(0);
    expect(parseScore("2.5")).toBe(2.5);
  });

  it("rejects scores the config file would also reject", () => {
    expect(() => parseScore("-1")).toThrow("Expected a non-negative number.");
    expect(() => parseScore("")).toThrow("Expected a non-negative number.");
    expect(() => parseScore("abc")).toThrow("Expected a non-negative number.");
  });

  it("validates line counts and job counts", () => {
    expect(parseCount("3")).toBe(3);
    expect(() => parseCount("-2")).toThrow("Expected a non-negative integer.");
    expect(() => parseCount("1.5")).toThrow("Expected a non-negative integer.");
    expect(parseJobs("4")).toBe(4);
    expect(() => parseJobs("0")).toThrow("Expected a positive integer.");
  });
});
