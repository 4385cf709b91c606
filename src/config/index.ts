export { loadConfigFile, resolveSearchConfig } from "./config-loader.js";
export { validateConfig } from "./config-validator.js";
export { DEFAULT_CONFIG_FILE, DEFAULT_SEARCH_CONFIG } from "./defaults.js";
export type {
  ColorMode,
  OutputFormat,
  SearchConfig,
  SearchConfigOverrides,
} from "./types.js";
