import { Dialect } from "../../ingest/types.js";
import type { Literal, LiteralExtractor } from "../types.js";
import { createLineLocator } from "./line-locator.js";

const DOUBLE_QUOTED = /"(?:\\.|[^"\\])*"/g;

/** Double-quoted literals as in C and C++. Escapes are kept verbatim. */
export const cFamilyExtractor: LiteralExtractor = {
  dialect: Dialect.CFamily,
  extract(content: string): Literal[] {
    const lineAt = createLineLocator(content);
    const literals: Literal[] = [];
    for (const match of content.matchAll(DOUBLE_QUOTED)) {
      literals.push({
        line: lineAt(match.index ?? 0),
        text: match[0].slice(1, -1),
      });
    }
    return literals;
  },
};
