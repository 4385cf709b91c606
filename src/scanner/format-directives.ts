import type { Token } from "./types.js";

// Flags, optional width, optional precision, then one conversion letter.
const DIRECTIVE_SOURCE = "%[-+0# ]*\\d*(?:\\.\\d+)?[dsf]";
const DIRECTIVE_PATTERN = new RegExp(DIRECTIVE_SOURCE, "g");
const WHOLE_DIRECTIVE_PATTERN = new RegExp(`^${DIRECTIVE_SOURCE}$`);
const BARE_PLACEHOLDER = "%s";

/**
 * Remove printf-style conversion specifiers. Removal repeats until nothing
 * matches, so `"%%ss"` ends up empty rather than as a fresh `"%s"`.
 */
export function stripFormatDirectives(text: string): string {
  let current = text;
  let stripped = current.replace(DIRECTIVE_PATTERN, "");
  while (stripped !== current) {
    current = stripped;
    stripped = current.replace(DIRECTIVE_PATTERN, "");
  }
  return stripped;
}

export function isFormatDirective(token: Token): boolean {
  return WHOLE_DIRECTIVE_PATTERN.test(token);
}

export function isBarePlaceholder(tokens: readonly Token[]): boolean {
  return tokens.length === 1 && tokens[0] === BARE_PLACEHOLDER;
}
