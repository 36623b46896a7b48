import fs from "node:fs";
import path from "node:path";

export const LOCK_FILE_NAME = "timelapse.lock";
/** Age after which a lock file without a readable pid is treated as abandoned. */
export const UNREADABLE_LOCK_GRACE_MS = 30_000;

export class SessionLockedError extends Error {
  constructor(readonly ownerPid: number | null) {
    super(`Timelapse already running (pid ${ownerPid ?? "unknown"})`);
    this.name = "SessionLockedError";
  }
}

export type SessionLock = {
  readonly path: string;
  release: () => void;
};

export type AcquireLockOptions = {
  pid?: number;
  isAlive?: (pid: number) => boolean;
  now?: () => number;
};

export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return (error as NodeJS.ErrnoException).code === "EPERM";
  }
};

const lockAgeMs = (lockPath: string, now: number): number | null => {
  try {
    return now - fs.statSync(lockPath).mtimeMs;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw error;
  }
};

const readOwner = (lockPath: string): number | null => {
  try {
    const pid = Number.parseInt(fs.readFileSync(lockPath, "utf8").trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
};

/**
 * One session per base directory. A lock left behind by a dead process is
 * reclaimed; a live owner makes the caller fail with `SessionLockedError`.
 * A lock file with no readable pid may belong to a process that has created
 * it but not written to it yet, so it counts as held until it is older than
 * `UNREADABLE_LOCK_GRACE_MS`.
 */
export const acquireSessionLock = (baseDir: string, options: AcquireLockOptions = {}): SessionLock => {
  const pid = options.pid ?? process.pid;
  const isAlive = options.isAlive ?? isProcessAlive;
  const now = options.now ?? Date.now;
  const lockPath = path.join(baseDir, LOCK_FILE_NAME);
  fs.mkdirSync(baseDir, { recursive: true });

  for (let attempt = 0; attempt < 3; attempt += 1) {
    try {
      fs.writeFileSync(lockPath, `${pid}\n`, { flag: "wx" });
      let released = false;
      return {
        path: lockPath,
        release: () => {
          if (released) return;
          released = true;
          if (readOwner(lockPath) === pid) {
            fs.rmSync(lockPath, { force: true });
          }
        },
      };
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "EEXIST") throw error;
      const owner = readOwner(lockPath);
      if (owner === null) {
        const age = lockAgeMs(lockPath, now());
        // Removed by its owner in the meantime.
        if (age === null) continue;
        if (age < UNREADABLE_LOCK_GRACE_MS) {
          throw new SessionLockedError(null);
        }
      } else if (owner !== pid && isAlive(owner)) {
        throw new SessionLockedError(owner);
      }
      fs.rmSync(lockPath, { force: true });
    }
  }
  throw new Error(`could not acquire ${lockPath}`);
};
