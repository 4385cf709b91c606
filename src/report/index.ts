export { buildJsonReport } from "./json-reporter.js";
export {
  renderCandidateHeader,
  renderContext,
  renderTextReport,
} from "./text-reporter.js";
export {
  HIGHLIGHT_END,
  HIGHLIGHT_START,
  highlightCandidateInLine,
  highlightTokens,
} from "./highlight.js";
export { SourceLineCache, splitLines } from "./source-lines.js";
export type {
  JsonReport,
  ReportInput,
  SourceLines,
  TextReportOptions,
} from "./types.js";
