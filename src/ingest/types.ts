export enum Dialect {
  CFamily = "c-family",
  ScriptFamily = "script-family",
  TemplateFamily = "template-family",
}

export interface FileEntry {
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly sizeBytes: number;
  readonly dialect: Dialect;
}

export interface FileDiscoveryOptions {
  readonly maxFileSizeBytes?: number;
  readonly ignoreFileNames?: readonly string[];
  readonly respectGitignore?: boolean;
}

export interface RepoContext {
  readonly rootPath: string;
  readonly displayRoot: string;
  readonly files: readonly FileEntry[];
  readonly source: "local" | "git";
  readonly cleanup?: () => Promise<void>;
}
