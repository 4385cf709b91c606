import { loadTarget } from "../ingest/repo-loader.js";
import { buildJsonReport } from "../report/json-reporter.js";
import { SourceLineCache } from "../report/source-lines.js";
import { renderTextReport } from "../report/text-reporter.js";
import { scanTarget, sortCandidates } from "../scanner/literal-scanner.js";
import { buildMessageQuery } from "../scanner/message-query.js";
import type { Candidate, DebugSink } from "../scanner/types.js";
import type { SearchConfig } from "../config/types.js";

export interface SearchOptions {
  readonly message: string;
  readonly target: string;
  readonly config: SearchConfig;
  /** Whether stdout is a terminal; decides color when `config.color` is auto. */
  readonly isTty?: boolean;
  readonly onDebug?: DebugSink;
}

export interface SearchResult {
  readonly candidates: readonly Candidate[];
  readonly filesScanned: number;
  readonly output: string;
}

export async function runSearchCommand(
  options: SearchOptions,
  toolVersion: string,
): Promise<SearchResult> {
  const { config, onDebug } = options;
  const query = buildMessageQuery(options.message, config.score);
  onDebug?.(`Tokenized message: ${JSON.stringify(query.tokens)}`);

  const context = await loadTarget(options.target, {
    maxFileSizeBytes: config.maxFileSize,
    respectGitignore: config.respectGitignore,
  });
  try {
    onDebug?.(`Found ${context.files.length} candidate files.`);
    const scanned = await scanTarget(context.files, query, {
      displayRoot: context.displayRoot,
      concurrency: config.jobs,
      onDebug,
    });
    const candidates = config.sort ? sortCandidates(scanned) : scanned;
    onDebug?.(`Total candidates found: ${candidates.length}`);

    const output =
      config.format === "json"
        ? JSON.stringify(
            buildJsonReport({
              toolVersion,
              message: options.message,
              minScore: config.score,
              filesScanned: context.files.length,
              candidates,
            }),
            null,
            2,
          )
        : await renderText(candidates, options, query.tokens);

    return { candidates, filesScanned: context.files.length, output };
  } finally {
    await context.cleanup?.();
  }
}

async function renderText(
  candidates: readonly Candidate[],
  options: SearchOptions,
  messageTokens: readonly string[],
): Promise<string> {
  const { config } = options;
  const lines = await renderTextReport(candidates, new SourceLineCache(), {
    before: config.before,
    after: config.after,
    lineNumbers: config.lineNumbers,
    withFilename: config.withFilename,
    color: resolveColor(config, options.isTty ?? false),
    separator: config.before !== 0 || config.after !== 0 || config.context !== undefined,
    messageTokens,
  });
  return lines.join("\n");
}

export function resolveColor(config: SearchConfig, isTty: boolean): boolean {
  if (config.color === "always") {
    return true;
  }
  if (config.color === "never") {
    return false;
  }
  return isTty;
}
