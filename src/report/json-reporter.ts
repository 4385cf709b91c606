import type { JsonReport, ReportInput } from "./types.js";

export function buildJsonReport(input: ReportInput): JsonReport {
  return {
    tool: { name: "msgtrace", version: input.toolVersion },
    query: { message: input.message, min_score: input.minScore },
    summary: {
      files_scanned: input.filesScanned,
      candidates: input.candidates.length,
    },
    candidates: input.candidates,
  };
}
