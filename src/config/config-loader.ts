import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { validateConfig } from "./config-validator.js";
import { DEFAULT_CONFIG_FILE, DEFAULT_SEARCH_CONFIG } from "./defaults.js";
import type { SearchConfig, SearchConfigOverrides } from "./types.js";

/**
 * Load overrides from `configPath`, or from `.msgtrace.yaml` in `cwd` when
 * no path is given. A missing default file means no overrides; a missing
 * explicit file is an error.
 */
export async function loadConfigFile(
  configPath?: string,
  cwd: string = process.cwd(),
): Promise<SearchConfigOverrides> {
  const filePath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (!configPath && isNotFound(error)) {
      return {};
    }
    throw new Error(`Unable to read config file ${filePath}: ${describe(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    throw new Error(`Invalid YAML in ${filePath}: ${describe(error)}`);
  }
  return validateConfig(parsed);
}

/** Apply override layers left to right over the defaults. */
export function resolveSearchConfig(
  ...layers: readonly SearchConfigOverrides[]
): SearchConfig {
  let config = DEFAULT_SEARCH_CONFIG;
  for (const layer of layers) {
    config = mergeConfig(config, layer);
  }
  return applyContext(config);
}

function mergeConfig(base: SearchConfig, layer: SearchConfigOverrides): SearchConfig {
  return {
    score: layer.score ?? base.score,
    sort: layer.sort ?? base.sort,
    lineNumbers: layer.lineNumbers ?? base.lineNumbers,
    withFilename: layer.withFilename ?? base.withFilename,
    before: layer.before ?? base.before,
    after: layer.after ?? base.after,
    context: layer.context ?? base.context,
    color: layer.color ?? base.color,
    format: layer.format ?? base.format,
    jobs: layer.jobs ?? base.jobs,
    maxFileSize: layer.maxFileSize ?? base.maxFileSize,
    respectGitignore: layer.respectGitignore ?? base.respectGitignore,
    debug: layer.debug ?? base.debug,
  };
}

// Context fills in whichever of before/after is still zero.
function applyContext(config: SearchConfig): SearchConfig {
  if (config.context === undefined) {
    return config;
  }
  return {
    ...config,
    before: config.before === 0 ? config.context : config.before,
    after: config.after === 0 ? config.context : config.after,
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
