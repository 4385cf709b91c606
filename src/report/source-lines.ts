import { readSourceText } from "../ingest/source-reader.js";
import type { SourceLines } from "./types.js";

/** Reads each file at most once and serves its lines from memory. */
export class SourceLineCache implements SourceLines {
  private readonly cache = new Map<string, Promise<readonly string[]>>();

  async linesOf(file: string): Promise<readonly string[]> {
    let lines = this.cache.get(file);
    if (!lines) {
      lines = readSourceText(file).then(splitLines);
      this.cache.set(file, lines);
    }
    return await lines;
  }
}

export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split(/\r?\n/);
  if (content.endsWith("\n")) {
    lines.pop();
  }
  return lines;
}
