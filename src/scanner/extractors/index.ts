import { Dialect } from "../../ingest/types.js";
import type { LiteralExtractor } from "../types.js";
import { cFamilyExtractor } from "./c-family.js";
import { scriptFamilyExtractor } from "./script-family.js";
import { templateFamilyExtractor } from "./template-family.js";

export const EXTRACTORS: Readonly<Record<Dialect, LiteralExtractor>> = {
  [Dialect.CFamily]: cFamilyExtractor,
  [Dialect.ScriptFamily]: scriptFamilyExtractor,
  [Dialect.TemplateFamily]: templateFamilyExtractor,
};

export function extractorFor(dialect: Dialect): LiteralExtractor {
  return EXTRACTORS[dialect];
}

export { cFamilyExtractor, scriptFamilyExtractor, templateFamilyExtractor };
export { createLineLocator } from "./line-locator.js";
