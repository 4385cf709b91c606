import { Dialect } from "../../ingest/types.js";
import type { Literal, LiteralExtractor } from "../types.js";
import { createLineLocator } from "./line-locator.js";

// Longer prefixes first so that `fr"..."` never leaves an `r` on the body.
const PREFIXED_LITERAL =
  /(ur|ru|fr|rf|r|u|f)?("(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*')/gi;
const EMBEDDED_EXPRESSION = /\{.*?\}/;

/**
 * Single- or double-quoted literals with an optional raw/unicode/formatted
 * prefix. In formatted literals each `{...}` span becomes a single space.
 */
export const scriptFamilyExtractor: LiteralExtractor = {
  dialect: Dialect.ScriptFamily,
  extract(content: string): Literal[] {
    const lineAt = createLineLocator(content);
    const literals: Literal[] = [];
    for (const match of content.matchAll(PREFIXED_LITERAL)) {
      const prefix = match[1] ?? "";
      const quoted = match[2] ?? "";
      const body = quoted.slice(1, -1);
      literals.push({
        line: lineAt(match.index ?? 0),
        text: isFormattedPrefix(prefix) ? elideExpressions(body) : body,
      });
    }
    return literals;
  },
};

function isFormattedPrefix(prefix: string): boolean {
  return prefix.toLowerCase().includes("f");
}

function elideExpressions(body: string): string {
  return body.split(EMBEDDED_EXPRESSION).join(" ");
}
