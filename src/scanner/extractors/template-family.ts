import { Dialect } from "../../ingest/types.js";
import type { Literal, LiteralExtractor } from "../types.js";
import { createLineLocator } from "./line-locator.js";

const QUOTED = /"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*'/g;

export const templateFamilyExtractor: LiteralExtractor = {
  dialect: Dialect.TemplateFamily,
  extract(content: string): Literal[] {
    const lineAt = createLineLocator(content);
    const literals: Literal[] = [];
    for (const match of content.matchAll(QUOTED)) {
      literals.push({
        line: lineAt(match.index ?? 0),
        text: match[0].slice(1, -1),
      });
    }
    return literals;
  },
};
