export type ColorMode = "auto" | "always" | "never";
export type OutputFormat = "text" | "json";

export interface SearchConfig {
  readonly score: number;
  readonly sort: boolean;
  readonly lineNumbers: boolean;
  readonly withFilename: boolean;
  readonly before: number;
  readonly after: number;
  readonly context?: number;
  readonly color: ColorMode;
  readonly format: OutputFormat;
  readonly jobs?: number;
  readonly maxFileSize?: number;
  readonly respectGitignore: boolean;
  readonly debug: boolean;
}

export type SearchConfigOverrides = Partial<SearchConfig>;
