import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  buildMessageQuery,
  discoverFiles,
  scanTarget,
  sortCandidates,
} from "../src/index.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "msgtrace-api-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("public api", () => {
  it("ranks literals across dialects", async () => {
    await fs.writeFile(
      path.join(tempDir, "net.c"),
      'fprintf(stderr, "connect to %s failed: %s\\n", host, err);\n',
      "utf8",
    );
    await fs.writeFile(
      path.join(tempDir, "net.py"),
      'log.error(f"connect failed for {host}")\n',
      "utf8",
    );

    const files = await discoverFiles(tempDir);
    const candidates = await scanTarget(
      files,
      buildMessageQuery("connect to db01 failed: timeout", 1),
    );
    const ranked = sortCandidates(candidates);

    expect(ranked.map((candidate) => [candidate.file, candidate.content])).toEqual([
      ["net.c", "connect to  failed: \\n"],
      ["net.py", "connect failed for  "],
    ]);
  });
});
