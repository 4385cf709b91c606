import type { DebugSink } from "../scanner/types.js";

export async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

export async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

// Debug output goes to stderr so stdout stays parseable with --format json.
export function createDebugSink(enabled: boolean): DebugSink | undefined {
  if (!enabled) {
    return undefined;
  }
  return (message: string): void => {
    process.stderr.write(`[DEBUG] ${message}\n`);
  };
}

export function isBrokenPipe(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EPIPE";
}
