import lockfile from "proper-lockfile";
import { randomUUID } from "crypto";
import { mkdir, open, readFile, rename, unlink } from "fs/promises";
import { basename, dirname, join } from "path";
import { IOFailureError, isErrnoException, LockTimeoutError } from "./errors.js";

const LOCK_RETRY_INTERVAL_MS = 25;
const LOCK_STALE_MS = 10_000;

export type ReleaseLock = () => Promise<void>;

/**
 * Takes the advisory lock for `path` (a `<path>.lock` directory beside it),
 * retrying for at most `timeoutMs` before giving up with LockTimeoutError.
 */
export async function acquireLock(path: string, timeoutMs: number): Promise<ReleaseLock> {
  const retries = Math.ceil(timeoutMs / LOCK_RETRY_INTERVAL_MS);
  try {
    return await lockfile.lock(path, {
      realpath: false,
      stale: LOCK_STALE_MS,
      retries: {
        retries,
        factor: 1,
        minTimeout: LOCK_RETRY_INTERVAL_MS,
        maxTimeout: LOCK_RETRY_INTERVAL_MS,
        randomize: false,
      },
    });
  } catch (error) {
    if (isErrnoException(error) && error.code === "ELOCKED") {
      throw new LockTimeoutError(path, timeoutMs, error);
    }
    throw new IOFailureError(path, "lock", error);
  }
}

/**
 * Runs `fn` while holding the locks for every path, taken in the given order
 * and released in reverse on every exit path. A failure of `fn` wins over a
 * failure to release.
 */
export async function withLocks<T>(
  paths: string[],
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<T> {
  const held: Array<{ path: string; release: ReleaseLock }> = [];
  let failed = false;
  try {
    for (const path of paths) {
      held.push({ path, release: await acquireLock(path, timeoutMs) });
    }
    return await fn();
  } catch (error) {
    failed = true;
    throw error;
  } finally {
    let releaseError: IOFailureError | null = null;
    for (const { path, release } of held.reverse()) {
      try {
        await release();
      } catch (error) {
        if (!releaseError) releaseError = new IOFailureError(path, "unlock", error);
      }
    }
    if (releaseError && !failed) {
      throw releaseError;
    }
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Reads a UTF-8 file, or returns null when it does not exist. Invalid UTF-8
 * is an error: decoding it lossily would change bytes on the next write.
 */
export async function readOptionalFile(path: string): Promise<string | null> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return null;
    }
    throw new IOFailureError(path, "read", error);
  }

  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new IOFailureError(path, "decode", new Error("file is not valid UTF-8", { cause: error }));
  }
}

/**
 * Writes `data` to a temporary file in the target's directory, flushes it and
 * renames it over `path`, so readers see either the old or the new content.
 */
export async function writeFileAtomic(path: string, data: string): Promise<void> {
  const tempPath = join(
    dirname(path),
    `.${basename(path)}.tmp-${process.pid}-${Date.now()}-${randomUUID()}`
  );
  try {
    const handle = await open(tempPath, "w");
    try {
      await handle.writeFile(data, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw new IOFailureError(path, "write", error);
  }
}

/** Creates `path` with `data` unless it already exists. Returns true when created. */
export async function createFileIfAbsent(path: string, data: string): Promise<boolean> {
  try {
    await mkdir(dirname(path), { recursive: true });
    const handle = await open(path, "wx");
    try {
      await handle.writeFile(data, "utf-8");
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      return false;
    }
    throw new IOFailureError(path, "create", error);
  }
}
