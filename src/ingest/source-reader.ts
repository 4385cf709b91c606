import fs from "node:fs/promises";

/**
 * Read a source file as UTF-8, replacing undecodable bytes. A file that
 * cannot be read at all yields an empty string.
 */
export async function readSourceText(filePath: string): Promise<string> {
  try {
    const buffer = await fs.readFile(filePath);
    return buffer.toString("utf8");
  } catch {
    return "";
  }
}
