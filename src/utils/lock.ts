import * as fs from "fs";
import * as path from "path";
import { setTimeout as sleep } from "timers/promises";
import { logger } from "./logger";

const POLL_INTERVAL_MS = 100;

export class LockTimeoutError extends Error {
  constructor(public readonly lockFile: string, timeoutMs: number) {
    super(`Could not acquire ${lockFile} within ${timeoutMs}ms`);
    this.name = "LockTimeoutError";
  }
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(error) === "EPERM";
  }
}

/**
 * Remove the lock file when the process that wrote it is gone.
 */
function clearStaleLock(lockFile: string): boolean {
  let owner: number;
  try {
    owner = Number.parseInt(fs.readFileSync(lockFile, "utf-8"), 10);
  } catch {
    return false;
  }

  if (Number.isNaN(owner) || isProcessAlive(owner)) return false;

  logger.warn(`Removing stale lock left by pid ${owner}`, { lockFile });
  try {
    fs.unlinkSync(lockFile);
    return true;
  } catch {
    return false;
  }
}

function tryCreate(lockFile: string): boolean {
  try {
    fs.writeFileSync(lockFile, String(process.pid), { flag: "wx" });
    return true;
  } catch (error) {
    if (errorCode(error) === "EEXIST") return false;
    throw error;
  }
}

export async function acquireLock(
  lockFile: string,
  timeoutMs: number
): Promise<() => void> {
  fs.mkdirSync(path.dirname(path.resolve(lockFile)), { recursive: true });
  const deadline = Date.now() + timeoutMs;

  while (!tryCreate(lockFile)) {
    if (clearStaleLock(lockFile)) continue;
    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockFile, timeoutMs);
    }
    await sleep(POLL_INTERVAL_MS);
  }

  let released = false;
  return () => {
    if (released) return;
    released = true;
    try {
      fs.unlinkSync(lockFile);
    } catch (error) {
      logger.warn(`Failed to remove lock file ${lockFile}`, error);
    }
  };
}

export async function withLock<T>(
  lockFile: string,
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<T> {
  const release = await acquireLock(lockFile, timeoutMs);
  try {
    return await fn();
  } finally {
    release();
  }
}
