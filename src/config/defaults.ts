import type { SearchConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = ".msgtrace.yaml";

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  score: 0,
  sort: false,
  lineNumbers: false,
  withFilename: false,
  before: 0,
  after: 0,
  color: "auto",
  format: "text",
  respectGitignore: false,
  debug: false,
};
