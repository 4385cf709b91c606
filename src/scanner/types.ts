import type { Dialect } from "../ingest/types.js";

export type Token = string;

export interface Literal {
  readonly line: number;
  readonly text: string;
}

export interface LiteralExtractor {
  readonly dialect: Dialect;
  extract(content: string): Literal[];
}

export interface MessageQuery {
  readonly message: string;
  readonly tokens: readonly Token[];
  readonly tokenSet: ReadonlySet<Token>;
  readonly minScore: number;
}

export type CandidateType = "string";

export interface Candidate {
  readonly type: CandidateType;
  readonly file: string;
  readonly line: number;
  readonly content: string;
  readonly score: number;
}

export type DebugSink = (message: string) => void;

export interface ScanOptions {
  /** Prefix joined to each file's relative path in `Candidate.file`. */
  readonly displayRoot?: string;
  readonly concurrency?: number;
  readonly onDebug?: DebugSink;
}
