import fs from "fs";

export interface FileLockOptions {
  retryDelayMs?: number;
  timeoutMs?: number;
  staleMs?: number;
}

export type ReleaseLock = () => Promise<void>;

/**
 * Exclusive advisory lock backed by an O_EXCL lock file. Lock files older than
 * `staleMs` belong to a crashed process and are removed.
 */
export async function acquireFileLock(lockPath: string, options: FileLockOptions = {}): Promise<ReleaseLock> {
  const retryDelayMs = options.retryDelayMs ?? 25;
  const timeoutMs = options.timeoutMs ?? 10000;
  const staleMs = options.staleMs ?? 30000;
  const startedAt = Date.now();

  for (;;) {
    try {
      const handle = await fs.promises.open(lockPath, "wx");
      await handle.writeFile(`${process.pid}\n`);
      await handle.close();
      return async () => {
        await fs.promises.rm(lockPath, { force: true });
      };
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EEXIST") {
        throw error;
      }
    }

    if (await isStale(lockPath, staleMs)) {
      await fs.promises.rm(lockPath, { force: true });
      continue;
    }

    if (Date.now() - startedAt > timeoutMs) {
      throw new Error(`Timed out waiting for lock ${lockPath}`);
    }
    await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
  }
}

/** Runs tasks one at a time in call order. */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task);
    this.tail = next.catch(() => undefined);
    return next;
  }
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(lockPath);
    return Date.now() - stat.mtimeMs > staleMs;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
