import fs from "node:fs/promises";
import path from "node:path";
import { simpleGit } from "simple-git";
import { discoverFiles } from "./file-discovery.js";
import { createTempCheckout } from "./temp-checkout.js";
import type { FileDiscoveryOptions, RepoContext } from "./types.js";

export async function loadTarget(
  target: string,
  options: FileDiscoveryOptions = {},
): Promise<RepoContext> {
  if (isGitUrl(target)) {
    return await loadFromGit(target, options);
  }

  const resolvedPath = path.resolve(target);
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(resolvedPath);
  } catch {
    throw new Error(
      `Search root does not exist: ${resolvedPath}. Provide a valid directory.`,
    );
  }

  if (!stats.isDirectory()) {
    throw new Error(
      `Search root must be a directory: ${resolvedPath}. Provide a directory to search.`,
    );
  }

  const files = await discoverFiles(resolvedPath, options);
  return {
    rootPath: resolvedPath,
    displayRoot: target,
    files,
    source: "local",
  };
}

export function isGitUrl(target: string): boolean {
  if (target.startsWith("git@")) {
    return true;
  }

  try {
    const url = new URL(target);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

async function loadFromGit(
  repoUrl: string,
  options: FileDiscoveryOptions,
): Promise<RepoContext> {
  const checkout = await createTempCheckout("msgtrace-");
  try {
    await simpleGit().clone(repoUrl, checkout.path, ["--depth", "1"]);
    const files = await discoverFiles(checkout.path, options);
    return {
      rootPath: checkout.path,
      displayRoot: checkout.path,
      files,
      source: "git",
      cleanup: checkout.cleanup,
    };
  } catch (error) {
    await checkout.cleanup();
    throw error;
  }
}
