import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discoverFiles } from "../../src/ingest/file-discovery.js";
import { Dialect } from "../../src/ingest/types.js";
import type { FileEntry } from "../../src/ingest/types.js";
import {
  scanFile,
  scanTarget,
  scoreLiteral,
  sortCandidates,
} from "../../src/scanner/literal-scanner.js";
import { buildMessageQuery } from "../../src/scanner/message-query.js";
import { mapWithConcurrency } from "../../src/scanner/worker-pool.js";
import type { Candidate } from "../../src/scanner/types.js";

const MEMORY_MESSAGE =
  "Memory: 20.8G (min: 250M peak: 27G swap: 2.7G swap peak: 6.7G)";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "msgtrace-scan-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("message query", () => {
  it("cannot be changed once built", () => {
    const query = buildMessageQuery("disk full", 2);

    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.tokens)).toBe(true);
    expect([...query.tokenSet]).toEqual(["disk", " ", "full"]);
    const { tokenSet } = query;
    if (!(tokenSet instanceof Set)) {
      throw new Error("expected a Set");
    }
    expect(() => tokenSet.add("extra")).toThrow(TypeError);
    expect(() => tokenSet.delete("disk")).toThrow(TypeError);
    expect(() => tokenSet.clear()).toThrow(TypeError);
    expect(tokenSet.size).toBe(3);
  });
});

describe("literal scoring", () => {
  it("strips directives before scoring", () => {
    const scored = scoreLiteral(
      { line: 1, text: "min: %s swap peak: %d" },
      buildMessageQuery(MEMORY_MESSAGE),
    );
    expect(scored?.content).toBe("min:  swap peak: ");
    expect(scored?.score).toBeCloseTo(11.4);
  });

  it("rejects literals that are only placeholders", () => {
    const query = buildMessageQuery("%s hello");
    expect(scoreLiteral({ line: 1, text: "%s" }, query)).toBeNull();
    expect(scoreLiteral({ line: 1, text: "%5d%-2s" }, query)).toBeNull();
    expect(scoreLiteral({ line: 1, text: "" }, query)).toBeNull();
  });
});

describe("scanner", () => {
  it("finds the printf that produced a memory report", async () => {
    await writeText(
      path.join(tempDir, "report.c"),
      'printf("min: %s swap peak: %d", x, y);\n',
    );
    const files = await discoverFiles(tempDir);

    const candidates = await scanTarget(
      files,
      buildMessageQuery(MEMORY_MESSAGE, 1),
    );

    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      type: "string",
      file: "report.c",
      line: 1,
      content: "min:  swap peak: ",
    });
    expect(candidates[0]?.score).toBeCloseTo(11.4);
  });

  it("finds the same statement in every dialect", async () => {
    await writeText(
      path.join(tempDir, "format_test.c"),
      [
        "#include <stdio.h>",
        "int main() {",
        '    printf("min: %s swap peak: %d", "ignored", 100);',
        "}",
      ].join("\n"),
    );
    await writeText(
      path.join(tempDir, "format_test.py"),
      'def show():\n    print("min: %s swap peak: %f" % ("ignored", 100.0))\n',
    );
    await writeText(
      path.join(tempDir, "format_test.js"),
      '// comment\nconsole.log("min: %s swap peak: %d");\n',
    );
    const files = await discoverFiles(tempDir);

    const candidates = await scanTarget(
      files,
      buildMessageQuery(MEMORY_MESSAGE, 1),
    );

    expect(
      candidates.map((candidate) => [candidate.file, candidate.line]),
    ).toEqual([
      ["format_test.c", 3],
      ["format_test.js", 2],
      ["format_test.py", 2],
    ]);
  });

  it("keeps zero-score literals at the default threshold", async () => {
    const file = await writeEntry("main.c", 'puts("unrelated");\n');
    const candidates = await scanFile(file, buildMessageQuery("disk full"));
    expect(candidates).toEqual([
      {
        type: "string",
        file: "main.c",
        line: 1,
        content: "unrelated",
        score: 0,
      },
    ]);
  });

  it("never promotes a bare placeholder literal", async () => {
    const file = await writeEntry("log.c", 'printf("%s", message);\n');
    const candidates = await scanFile(file, buildMessageQuery("%s"));
    expect(candidates).toEqual([]);
  });

  it("joins the display root onto file paths", async () => {
    const file = await writeEntry("main.c", 'puts("disk full");\n');
    const candidates = await scanFile(file, buildMessageQuery("disk full"), {
      displayRoot: "project",
    });
    expect(candidates[0]?.file).toBe(path.join("project", "main.c"));
  });

  it("treats unreadable files as empty", async () => {
    const readable = await writeEntry("ok.c", 'puts("disk full");\n');
    const missing: FileEntry = {
      absolutePath: path.join(tempDir, "gone.c"),
      relativePath: "gone.c",
      sizeBytes: 0,
      dialect: Dialect.CFamily,
    };

    const candidates = await scanTarget(
      [missing, readable],
      buildMessageQuery("disk full", 1),
    );

    expect(candidates.map((candidate) => candidate.file)).toEqual(["ok.c"]);
  });

  it("returns the same candidates with one worker or many", async () => {
    for (let i = 0; i < 8; i += 1) {
      await writeText(
        path.join(tempDir, `mod${i}.c`),
        `puts("disk ${i} full");\nputs("full disk");\n`,
      );
    }
    const files = await discoverFiles(tempDir);
    const query = buildMessageQuery("disk 3 full", 0.5);

    const serial = await scanTarget(files, query, { concurrency: 1 });
    const parallel = await scanTarget(files, query, { concurrency: 4 });

    expect(parallel).toEqual(serial);
    expect(serial).toHaveLength(8);
  });

  it("reports progress through the debug hook", async () => {
    const file = await writeEntry("main.c", 'puts("disk full");\n');
    const messages: string[] = [];
    await scanFile(file, buildMessageQuery("disk full"), {
      onDebug: (message) => messages.push(message),
    });
    expect(messages).toEqual([
      "Processing file: main.c with extractor: c-family, found 1 literals.",
      "File: main.c, Line: 1, Score: 8.10",
    ]);
  });
});

describe("candidate ordering", () => {
  it("sorts by score and keeps discovery order on ties", () => {
    const make = (file: string, score: number): Candidate => ({
      type: "string",
      file,
      line: 1,
      content: file,
      score,
    });
    const sorted = sortCandidates([
      make("a", 1),
      make("b", 3),
      make("c", 1),
      make("d", 3),
    ]);
    expect(sorted.map((candidate) => candidate.file)).toEqual([
      "b",
      "d",
      "a",
      "c",
    ]);
  });
});

describe("worker pool", () => {
  it("keeps results in input order", async () => {
    const delays = [30, 5, 20, 0];
    const results = await mapWithConcurrency(delays, 3, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return index;
    });
    expect(results).toEqual([0, 1, 2, 3]);
  });

  it("handles empty input", async () => {
    const results = await mapWithConcurrency([], 4, async () => 1);
    expect(results).toEqual([]);
  });
});

async function writeEntry(name: string, contents: string): Promise<FileEntry> {
  const absolutePath = path.join(tempDir, name);
  await writeText(absolutePath, contents);
  return {
    absolutePath,
    relativePath: name,
    sizeBytes: Buffer.byteLength(contents),
    dialect: Dialect.CFamily,
  };
}

async function writeText(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents, "utf8");
}
