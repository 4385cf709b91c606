import { stripFormatDirectives } from "../scanner/format-directives.js";
import { isWordToken } from "../scanner/tokenizer.js";

export const HIGHLIGHT_START = "\u001b[31m";
export const HIGHLIGHT_END = "\u001b[0m";

const DOUBLE_QUOTED = /"(?:\\.|[^"\\])*"/;
const WORD_CHAR = "[\\p{L}\\p{N}_]";

/**
 * Highlight the body of the first double-quoted literal on the line, if its
 * directive-stripped body is the candidate content.
 */
export function highlightCandidateInLine(line: string, content: string): string {
  const match = DOUBLE_QUOTED.exec(line);
  if (!match) {
    return line;
  }
  const inner = match[0].slice(1, -1);
  if (stripFormatDirectives(inner) !== content) {
    return line;
  }
  const start = match.index;
  const end = start + match[0].length;
  return `${line.slice(0, start)}"${wrap(inner)}"${line.slice(end)}`;
}

/**
 * Highlight every occurrence of the message's non-whitespace tokens. Word
 * tokens only match on word boundaries; longer tokens win over shorter ones.
 */
export function highlightTokens(line: string, tokens: readonly string[]): string {
  const pattern = buildTokenPattern(tokens);
  if (!pattern) {
    return line;
  }
  return line.replace(pattern, (found) => wrap(found));
}

function buildTokenPattern(tokens: readonly string[]): RegExp | null {
  const unique = [...new Set(tokens)].filter((token) => token.trim().length > 0);
  if (unique.length === 0) {
    return null;
  }
  unique.sort((a, b) => b.length - a.length);
  const alternatives = unique.map((token) => {
    const escaped = escapeRegex(token);
    return isWordToken(token)
      ? `(?<!${WORD_CHAR})${escaped}(?!${WORD_CHAR})`
      : escaped;
  });
  return new RegExp(alternatives.join("|"), "gu");
}

function wrap(text: string): string {
  return `${HIGHLIGHT_START}${text}${HIGHLIGHT_END}`;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
