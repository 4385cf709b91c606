export { discoverFiles } from "./file-discovery.js";
export { classifyFile, DIALECT_EXTENSIONS } from "./file-classifier.js";
export { compileIgnoreRule, isIgnored, parseIgnoreFile } from "./ignore-rules.js";
export type { IgnoreRule } from "./ignore-rules.js";
export { isGitUrl, loadTarget } from "./repo-loader.js";
export { readSourceText } from "./source-reader.js";
export type { FileDiscoveryOptions, FileEntry, RepoContext } from "./types.js";
export { Dialect } from "./types.js";
