export { tokenize, isWordToken } from "./tokenizer.js";
export {
  isBarePlaceholder,
  isFormatDirective,
  stripFormatDirectives,
} from "./format-directives.js";
export { buildMessageQuery, DEFAULT_MIN_SCORE } from "./message-query.js";
export { EXTRACTORS, extractorFor } from "./extractors/index.js";
export { scanFile, scanTarget, scoreLiteral, sortCandidates } from "./literal-scanner.js";
export { defaultConcurrency, mapWithConcurrency } from "./worker-pool.js";
export type {
  Candidate,
  CandidateType,
  DebugSink,
  Literal,
  LiteralExtractor,
  MessageQuery,
  ScanOptions,
  Token,
} from "./types.js";
