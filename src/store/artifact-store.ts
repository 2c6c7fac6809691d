import fs from "fs";
import path from "path";
import { NotFoundError } from "../errors";

export type ArtifactStoreOptions = {
  now?: () => Date;
  /** Called after the temp file is fully written and before it replaces the target. */
  beforeRename?: (tempPath: string, targetPath: string) => void;
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatBackupStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Backup-guarded access to files on disk. Writes go through a temp file in the
 * target directory and a rename, so a reader never sees a partial file.
 */
export class ArtifactStore {
  private readonly now: () => Date;
  private readonly beforeRename?: (tempPath: string, targetPath: string) => void;
  private tempCounter = 0;

  constructor(options: ArtifactStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.beforeRename = options.beforeRename;
  }

  exists(filePath: string): boolean {
    try {
      return fs.statSync(filePath).isFile();
    } catch {
      return false;
    }
  }

  read(filePath: string): Buffer {
    try {
      return fs.readFileSync(filePath);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === "ENOENT" || err.code === "EISDIR") {
        throw new NotFoundError(filePath);
      }
      throw err;
    }
  }

  readIfExists(filePath: string): Buffer | null {
    return this.exists(filePath) ? this.read(filePath) : null;
  }

  /** Copies `filePath` to a timestamped backup in `dir` (its own directory by default). */
  backup(filePath: string, dir = path.dirname(filePath)): string | null {
    if (!this.exists(filePath)) {
      return null;
    }
    fs.mkdirSync(dir, { recursive: true });
    const base = path.join(dir, `${path.basename(filePath)}.backup.${formatBackupStamp(this.now())}`);
    for (let counter = 0; ; counter += 1) {
      const candidate = counter === 0 ? base : `${base}.${counter}`;
      try {
        fs.copyFileSync(filePath, candidate, fs.constants.COPYFILE_EXCL);
        return candidate;
      } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code !== "EEXIST") {
          throw err;
        }
      }
    }
  }

  /** Backups of `filePath` in `dir`, newest first. */
  listBackups(filePath: string, dir = path.dirname(filePath)): string[] {
    const prefix = `${path.basename(filePath)}.backup.`;
    let names: string[];
    try {
      names = fs.readdirSync(dir);
    } catch {
      return [];
    }
    return names
      .map((name) => ({ name, match: /^(\d{8}_\d{6})(?:\.(\d+))?$/.exec(name.slice(prefix.length)) }))
      .filter((entry) => entry.name.startsWith(prefix) && entry.match !== null)
      .map((entry) => ({
        file: path.join(dir, entry.name),
        stamp: entry.match?.[1] ?? "",
        counter: Number(entry.match?.[2] ?? "0")
      }))
      .sort((a, b) => (a.stamp === b.stamp ? b.counter - a.counter : b.stamp.localeCompare(a.stamp)))
      .map((entry) => entry.file);
  }

  write(filePath: string, bytes: Buffer | string): void {
    const dir = path.dirname(filePath);
    fs.mkdirSync(dir, { recursive: true });
    this.tempCounter += 1;
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${this.tempCounter}.tmp`);
    try {
      fs.writeFileSync(tempPath, bytes);
      this.beforeRename?.(tempPath, filePath);
      fs.renameSync(tempPath, filePath);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw error;
    }
  }

  restore(backupPath: string, filePath: string): void {
    if (!this.exists(backupPath)) {
      throw new NotFoundError(backupPath);
    }
    this.write(filePath, this.read(backupPath));
  }

  remove(filePath: string): void {
    fs.rmSync(filePath, { force: true });
  }
}
