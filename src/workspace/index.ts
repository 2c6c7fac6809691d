import fs from "fs";
import path from "path";
import { getFlags } from "../context/flags";

const RUN_LOCK_FILE = ".config-reconciler.lock";
const RUN_LOCK_RETRY_MS = 50;
const RUN_LOCK_WAIT_MS = 5000;
const RUN_LOCK_STALE_MS = 10 * 60 * 1000;

/** `--project` when given, otherwise the current directory. Must exist. */
export function resolveProjectRoot(project = getFlags().project): string {
  const root = path.resolve(project ?? process.cwd());
  let stats: fs.Stats;
  try {
    stats = fs.statSync(root);
  } catch {
    throw new Error(`Project root does not exist: ${root}`);
  }
  if (!stats.isDirectory()) {
    throw new Error(`Project root is not a directory: ${root}`);
  }
  return root;
}

/** Resolves an artifact path and refuses anything that escapes the project root. */
export function resolveArtifactPath(projectRoot: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    throw new Error(`Artifact paths must be relative to the project root: ${relativePath}`);
  }
  const resolved = path.resolve(projectRoot, relativePath);
  const relative = path.relative(projectRoot, resolved);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new Error(`Artifact path escapes the project root: ${relativePath}`);
  }
  return resolved;
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function isStaleLock(lockPath: string): boolean {
  try {
    const stats = fs.statSync(lockPath);
    return Date.now() - stats.mtimeMs > RUN_LOCK_STALE_MS;
  } catch {
    return false;
  }
}

function acquireRunLock(lockPath: string): void {
  const start = Date.now();
  while (true) {
    try {
      const fd = fs.openSync(lockPath, "wx");
      try {
        const payload = JSON.stringify({ pid: process.pid, createdAt: new Date().toISOString() });
        fs.writeFileSync(fd, payload, "utf-8");
      } finally {
        fs.closeSync(fd);
      }
      return;
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== "EEXIST") {
        throw err;
      }
      if (isStaleLock(lockPath)) {
        fs.rmSync(lockPath, { force: true });
        continue;
      }
      if (Date.now() - start > RUN_LOCK_WAIT_MS) {
        throw new Error(`Another reconciliation run holds ${lockPath}. Retry when it finishes.`);
      }
      sleepSync(RUN_LOCK_RETRY_MS);
    }
  }
}

/** Serializes runs against one checkout. */
export async function withRunLock<T>(projectRoot: string, fn: () => Promise<T>): Promise<T> {
  const lockPath = path.join(projectRoot, RUN_LOCK_FILE);
  acquireRunLock(lockPath);
  try {
    return await fn();
  } finally {
    fs.rmSync(lockPath, { force: true });
  }
}
