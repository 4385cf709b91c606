import type { ColorMode, OutputFormat, SearchConfigOverrides } from "./types.js";

const CONFIG_KEYS = new Set([
  "score",
  "sort",
  "line_numbers",
  "with_filename",
  "before",
  "after",
  "context",
  "color",
  "format",
  "jobs",
  "max_file_size",
  "respect_gitignore",
  "debug",
]);
const COLOR_MODES: readonly ColorMode[] = ["auto", "always", "never"];
const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

/**
 * Validate a parsed config document and convert its snake_case keys.
 * Every problem is collected before throwing.
 */
export function validateConfig(input: unknown): SearchConfigOverrides {
  if (input === null || input === undefined) {
    return {};
  }
  const errors: string[] = [];
  if (!isRecord(input)) {
    throw new Error("Invalid config: config must be a mapping");
  }

  for (const key of Object.keys(input)) {
    if (!CONFIG_KEYS.has(key)) {
      errors.push(`unknown key '${key}'`);
    }
  }

  const config: SearchConfigOverrides = {
    score: readNumber(input, "score", errors, { min: 0 }),
    sort: readBoolean(input, "sort", errors),
    lineNumbers: readBoolean(input, "line_numbers", errors),
    withFilename: readBoolean(input, "with_filename", errors),
    before: readNumber(input, "before", errors, { min: 0, integer: true }),
    after: readNumber(input, "after", errors, { min: 0, integer: true }),
    context: readNumber(input, "context", errors, { min: 0, integer: true }),
    color: readChoice(input, "color", COLOR_MODES, errors),
    format: readChoice(input, "format", OUTPUT_FORMATS, errors),
    jobs: readNumber(input, "jobs", errors, { min: 1, integer: true }),
    maxFileSize: readNumber(input, "max_file_size", errors, { min: 1, integer: true }),
    respectGitignore: readBoolean(input, "respect_gitignore", errors),
    debug: readBoolean(input, "debug", errors),
  };

  if (errors.length > 0) {
    throw new Error(`Invalid config: ${errors.join("; ")}`);
  }
  return config;
}

interface NumberRule {
  readonly min?: number;
  readonly integer?: boolean;
}

function readNumber(
  input: Record<string, unknown>,
  key: string,
  errors: string[],
  rule: NumberRule = {},
): number | undefined {
  const value = input[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    errors.push(`${key} must be a number`);
    return undefined;
  }
  if (rule.integer && !Number.isInteger(value)) {
    errors.push(`${key} must be an integer`);
    return undefined;
  }
  if (rule.min !== undefined && value < rule.min) {
    errors.push(`${key} must be >= ${rule.min}`);
    return undefined;
  }
  return value;
}

function readBoolean(
  input: Record<string, unknown>,
  key: string,
  errors: string[],
): boolean | undefined {
  const value = input[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    errors.push(`${key} must be true or false`);
    return undefined;
  }
  return value;
}

function readChoice<T extends string>(
  input: Record<string, unknown>,
  key: string,
  choices: readonly T[],
  errors: string[],
): T | undefined {
  const value = input[key];
  if (value === undefined) {
    return undefined;
  }
  const choice = choices.find((candidate) => candidate === value);
  if (choice === undefined) {
    errors.push(`${key} must be one of ${choices.join(", ")}`);
  }
  return choice;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
