import type { Candidate } from "../scanner/types.js";

export interface TextReportOptions {
  readonly before: number;
  readonly after: number;
  readonly lineNumbers: boolean;
  readonly withFilename: boolean;
  readonly color: boolean;
  /** Print a separator after each block; set when any context flag was given. */
  readonly separator: boolean;
  readonly messageTokens: readonly string[];
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly message: string;
  readonly minScore: number;
  readonly filesScanned: number;
  readonly candidates: readonly Candidate[];
}

export interface JsonReport {
  readonly tool: { readonly name: string; readonly version: string };
  readonly query: { readonly message: string; readonly min_score: number };
  readonly summary: {
    readonly files_scanned: number;
    readonly candidates: number;
  };
  readonly candidates: readonly Candidate[];
}

export interface SourceLines {
  linesOf(file: string): Promise<readonly string[]>;
}
