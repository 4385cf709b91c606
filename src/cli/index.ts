#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command, Option } from "commander";
import { loadConfigFile, resolveSearchConfig } from "../config/config-loader.js";
import type { OutputFormat, SearchConfigOverrides } from "../config/types.js";
import { parseCount, parseJobs, parseScore } from "./arg-parsers.js";
import { createDebugSink, isBrokenPipe, writeError, writeStdout } from "./output.js";
import { runSearchCommand } from "./search-command.js";

interface CliFlags {
  readonly n?: boolean;
  readonly A?: number;
  readonly B?: number;
  readonly C?: number;
  readonly color?: boolean;
  readonly nocolor?: boolean;
  readonly score?: number;
  readonly sort?: boolean;
  readonly withFilename?: boolean;
  readonly format?: OutputFormat;
  readonly jobs?: number;
  readonly config?: string;
  readonly gitignore?: boolean;
  readonly debug?: boolean;
}

process.stdout.on("error", (error) => {
  if (isBrokenPipe(error)) {
    process.exit(0);
  }
  throw error;
});

const toolVersion = await loadVersion();
const program = new Command();

program
  .name("msgtrace")
  .version(toolVersion)
  .description(
    "Find the string literals in a source tree that most likely produced a log message.",
  )
  .argument("<message>", "The observed message, e.g. 'main: foo.bar(): error occurred'")
  .argument("<directory>", "Root directory (or git URL) to search recursively")
  .option("-n", "Display line numbers")
  .option("-A <lines>", "Show N lines after the match", parseCount)
  .option("-B <lines>", "Show N lines before the match", parseCount)
  .option(
    "-C <lines>",
    "Show N lines of context before and after the match (fills -A and -B when unset)",
    parseCount,
  )
  .addOption(
    new Option("--color", "Force color highlighting on").conflicts("nocolor"),
  )
  .addOption(new Option("--nocolor", "Force color highlighting off"))
  .option("--score <number>", "Minimum score threshold for a candidate", parseScore)
  .option("--sort", "Sort candidates by score (highest first)")
  .option(
    "-H, --with-filename",
    "Display filename on each matching line (suppress candidate summary)",
  )
  .addOption(
    new Option("--format <format>", "Output format").choices(["text", "json"]),
  )
  .option("--jobs <number>", "Number of files scanned in parallel", parseJobs)
  .option("--config <path>", "Config file (default: ./.msgtrace.yaml when present)")
  .option("--gitignore", "Also skip files matched by the root .gitignore")
  .option("--debug", "Print debug output to stderr")
  .action(async (message: string, directory: string, flags: CliFlags) => {
    try {
      const fileConfig = await loadConfigFile(flags.config);
      const config = resolveSearchConfig(fileConfig, toOverrides(flags));
      const result = await runSearchCommand(
        {
          message,
          target: directory,
          config,
          isTty: process.stdout.isTTY === true,
          onDebug: createDebugSink(config.debug),
        },
        toolVersion,
      );
      if (result.output.length > 0) {
        await writeStdout(result.output + "\n");
      }
    } catch (error) {
      if (isBrokenPipe(error)) {
        return;
      }
      await writeError(error);
      process.exitCode = 1;
    }
  });

function toOverrides(flags: CliFlags): SearchConfigOverrides {
  return {
    score: flags.score,
    sort: flags.sort,
    lineNumbers: flags.n,
    withFilename: flags.withFilename,
    before: flags.B,
    after: flags.A,
    context: flags.C,
    color: flags.color ? "always" : flags.nocolor ? "never" : undefined,
    format: flags.format,
    jobs: flags.jobs,
    respectGitignore: flags.gitignore,
    debug: flags.debug,
  };
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

await program.parseAsync(process.argv);
