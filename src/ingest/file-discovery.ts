import type { Stats } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { classifyFile } from "./file-classifier.js";
import { compileIgnoreRule, isIgnored, parseIgnoreFile } from "./ignore-rules.js";
import type { IgnoreRule } from "./ignore-rules.js";
import type { FileDiscoveryOptions, FileEntry } from "./types.js";

const DEFAULT_IGNORE_FILES = [".msgtraceignore"] as const;
const GITIGNORE_FILE = ".gitignore";
const VCS_DIRECTORY_RULE = ".git/";

interface Walker {
  readonly root: string;
  readonly rules: readonly IgnoreRule[];
  readonly maxFileSize: number;
  readonly seenDirectories: Set<string>;
  readonly found: FileEntry[];
}

/**
 * Walk `rootPath` and return every file whose extension maps to a literal
 * dialect, ordered by relative path. Unreadable directories and dangling
 * links are skipped rather than reported.
 */
export async function discoverFiles(
  rootPath: string,
  options: FileDiscoveryOptions = {},
): Promise<FileEntry[]> {
  const root = await fs.realpath(rootPath);
  const ignoreFiles = new Set<string>(options.ignoreFileNames ?? DEFAULT_IGNORE_FILES);
  if (options.respectGitignore) {
    ignoreFiles.add(GITIGNORE_FILE);
  }

  const walker: Walker = {
    root,
    rules: await collectIgnoreRules(root, ignoreFiles),
    maxFileSize: options.maxFileSizeBytes ?? Number.POSITIVE_INFINITY,
    seenDirectories: new Set<string>(),
    found: [],
  };
  await visitDirectory(walker, root, "");

  return walker.found.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}

async function visitDirectory(
  walker: Walker,
  directory: string,
  relativeDirectory: string,
): Promise<void> {
  const identity = await realpathOrNull(directory);
  if (identity === null || walker.seenDirectories.has(identity)) {
    return;
  }
  walker.seenDirectories.add(identity);

  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch {
    return;
  }
  names.sort((a, b) => a.localeCompare(b));

  for (const name of names) {
    const absolutePath = path.join(directory, name);
    const relativePath = relativeDirectory ? `${relativeDirectory}/${name}` : name;
    const stats = await statInsideRoot(walker.root, absolutePath);
    if (!stats) {
      continue;
    }
    if (stats.isDirectory()) {
      if (!isIgnored(relativePath, true, walker.rules)) {
        await visitDirectory(walker, absolutePath, relativePath);
      }
    } else if (stats.isFile()) {
      recordFile(walker, absolutePath, relativePath, stats.size);
    }
  }
}

function recordFile(
  walker: Walker,
  absolutePath: string,
  relativePath: string,
  sizeBytes: number,
): void {
  if (sizeBytes > walker.maxFileSize || isIgnored(relativePath, false, walker.rules)) {
    return;
  }
  const dialect = classifyFile(relativePath);
  if (dialect) {
    walker.found.push({ absolutePath, relativePath, sizeBytes, dialect });
  }
}

async function collectIgnoreRules(
  root: string,
  fileNames: Iterable<string>,
): Promise<IgnoreRule[]> {
  const rules: IgnoreRule[] = [];
  const vcsRule = compileIgnoreRule(VCS_DIRECTORY_RULE);
  if (vcsRule) {
    rules.push(vcsRule);
  }
  for (const fileName of fileNames) {
    const contents = await fs.readFile(path.join(root, fileName), "utf8").catch(() => null);
    if (contents !== null) {
      rules.push(...parseIgnoreFile(contents));
    }
  }
  return rules;
}

/**
 * Stat through symlinks, but only for links that resolve inside the root;
 * anything else (including dangling links) yields null.
 */
async function statInsideRoot(root: string, target: string): Promise<Stats | null> {
  const resolved = await realpathOrNull(target);
  if (resolved === null) {
    return null;
  }
  const fromRoot = path.relative(root, resolved);
  if (fromRoot.startsWith("..") || path.isAbsolute(fromRoot)) {
    return null;
  }
  return await fs.stat(resolved).catch(() => null);
}

async function realpathOrNull(target: string): Promise<string | null> {
  return await fs.realpath(target).catch(() => null);
}
