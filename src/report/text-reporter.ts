import type { Candidate } from "../scanner/types.js";
import { highlightCandidateInLine, highlightTokens } from "./highlight.js";
import type { SourceLines, TextReportOptions } from "./types.js";

const SEPARATOR = "-".repeat(40);
const MATCH_MARKER = " <== match";

export async function renderTextReport(
  candidates: readonly Candidate[],
  source: SourceLines,
  options: TextReportOptions,
): Promise<string[]> {
  const output: string[] = [];
  for (const candidate of candidates) {
    if (!options.withFilename) {
      output.push(renderCandidateHeader(candidate));
    }
    const lines = await source.linesOf(candidate.file);
    output.push(...renderContext(candidate, lines, options));
    if (options.separator) {
      output.push(SEPARATOR);
    }
  }
  return output;
}

export function renderCandidateHeader(candidate: Candidate): string {
  return `File: ${candidate.file}  Line: ${candidate.line}  Type: ${candidate.type}  Score: ${candidate.score.toFixed(1)}`;
}

export function renderContext(
  candidate: Candidate,
  lines: readonly string[],
  options: TextReportOptions,
): string[] {
  const matchIndex = candidate.line - 1;
  const start = Math.max(0, matchIndex - options.before);
  const end = Math.min(lines.length, matchIndex + options.after + 1);
  const output: string[] = [];

  for (let index = start; index < end; index += 1) {
    let text = (lines[index] ?? "").trimEnd();
    const isMatch = index === matchIndex;
    if (options.color) {
      text = isMatch
        ? highlightCandidateInLine(text, candidate.content)
        : highlightTokens(text, options.messageTokens);
    }
    const marker = isMatch ? MATCH_MARKER : "";
    output.push(`${linePrefix(candidate.file, index + 1, options)}${text}${marker}`);
  }
  return output;
}

function linePrefix(file: string, lineNumber: number, options: TextReportOptions): string {
  if (options.withFilename) {
    return options.lineNumbers ? `${file}:${lineNumber}:` : `${file}:`;
  }
  return options.lineNumbers ? `${lineNumber}:` : "";
}
