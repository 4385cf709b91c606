import { rmSync } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export interface TempCheckout {
  readonly path: string;
  /** Removes the directory and detaches the process hooks. Safe to call twice. */
  readonly cleanup: () => Promise<void>;
}

const SIGNAL_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const;

/**
 * Create a temp directory that is removed on `cleanup()`, on process exit,
 * or when the process is interrupted before `cleanup()` runs.
 */
export async function createTempCheckout(prefix: string): Promise<TempCheckout> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));

  const removeNow = (): void => {
    rmSync(dir, { recursive: true, force: true });
  };
  const onSignal = (signal: NodeJS.Signals): void => {
    removeNow();
    process.exit(signal === "SIGINT" ? SIGNAL_EXIT_CODES.SIGINT : SIGNAL_EXIT_CODES.SIGTERM);
  };
  process.once("exit", removeNow);
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const cleanup = async (): Promise<void> => {
    process.off("exit", removeNow);
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await fs.rm(dir, { recursive: true, force: true });
  };

  return { path: dir, cleanup };
}
