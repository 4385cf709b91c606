import path from "node:path";
import { readSourceText } from "../ingest/source-reader.js";
import type { FileEntry } from "../ingest/types.js";
import { calculateScore } from "../scoring/score-calculator.js";
import { extractorFor } from "./extractors/index.js";
import { isBarePlaceholder, stripFormatDirectives } from "./format-directives.js";
import { tokenize } from "./tokenizer.js";
import { defaultConcurrency, mapWithConcurrency } from "./worker-pool.js";
import type { Candidate, Literal, MessageQuery, ScanOptions } from "./types.js";

export interface ScoredLiteral {
  readonly content: string;
  readonly score: number;
}

/**
 * Normalize and score one literal. Returns null for literals that carry no
 * text once format directives are gone.
 */
export function scoreLiteral(
  literal: Literal,
  query: MessageQuery,
): ScoredLiteral | null {
  const content = stripFormatDirectives(literal.text);
  const tokens = tokenize(content);
  if (tokens.length === 0 || isBarePlaceholder(tokens)) {
    return null;
  }
  return { content, score: calculateScore(query, tokens) };
}

export async function scanFile(
  file: FileEntry,
  query: MessageQuery,
  options: ScanOptions = {},
): Promise<Candidate[]> {
  const content = await readSourceText(file.absolutePath);
  const extractor = extractorFor(file.dialect);
  const literals = extractor.extract(content);
  const displayPath = toDisplayPath(file, options.displayRoot);
  options.onDebug?.(
    `Processing file: ${displayPath} with extractor: ${extractor.dialect}, found ${literals.length} literals.`,
  );

  const candidates: Candidate[] = [];
  for (const literal of literals) {
    const scored = scoreLiteral(literal, query);
    if (!scored) {
      continue;
    }
    options.onDebug?.(
      `File: ${displayPath}, Line: ${literal.line}, Score: ${scored.score.toFixed(2)}`,
    );
    if (scored.score >= query.minScore) {
      candidates.push({
        type: "string",
        file: displayPath,
        line: literal.line,
        content: scored.content,
        score: scored.score,
      });
    }
  }
  return candidates;
}

/**
 * Scan every file with a bounded pool of workers. Candidates come back in
 * discovery order: file by file, and by position within each file.
 */
export async function scanTarget(
  files: readonly FileEntry[],
  query: MessageQuery,
  options: ScanOptions = {},
): Promise<Candidate[]> {
  const concurrency = options.concurrency ?? defaultConcurrency();
  const perFile = await mapWithConcurrency(files, concurrency, async (file) => {
    try {
      return await scanFile(file, query, options);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      options.onDebug?.(`Skipping ${file.relativePath}: ${reason}`);
      return [];
    }
  });
  return perFile.flat();
}

/** Highest score first; equal scores keep their discovery order. */
export function sortCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => b.score - a.score);
}

function toDisplayPath(file: FileEntry, displayRoot?: string): string {
  if (displayRoot === undefined) {
    return file.relativePath;
  }
  return path.join(displayRoot, file.relativePath);
}
