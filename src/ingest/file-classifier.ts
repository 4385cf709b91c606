import path from "node:path";
import { Dialect } from "./types.js";

export const DIALECT_EXTENSIONS: Readonly<Record<string, Dialect>> = {
  ".c": Dialect.CFamily,
  ".h": Dialect.CFamily,
  ".cpp": Dialect.CFamily,
  ".cc": Dialect.CFamily,
  ".py": Dialect.ScriptFamily,
  ".js": Dialect.TemplateFamily,
  ".jsx": Dialect.TemplateFamily,
};

export function classifyFile(relativePath: string): Dialect | null {
  const normalized = relativePath.split(path.sep).join(path.posix.sep);
  const ext = path.posix.extname(normalized).toLowerCase();
  if (!Object.hasOwn(DIALECT_EXTENSIONS, ext)) {
    return null;
  }
  return DIALECT_EXTENSIONS[ext] ?? null;
}
