import type { Token } from "./types.js";

const TOKEN_PATTERN = /\s+|[\p{L}\p{N}_.]+|[^\s\p{L}\p{N}_.]/gu;
const WORD_PATTERN = /^[\p{L}\p{N}_.]+$/u;

/**
 * Split text into whitespace runs, word runs (letters, digits, `_` and `.`)
 * and single remaining characters. Joining the result gives back the input.
 */
export function tokenize(text: string): Token[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

export function isWordToken(token: Token): boolean {
  return WORD_PATTERN.test(token);
}
