import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveArtifactPath, resolveProjectRoot, withRunLock } from "..";

describe("workspace", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "reconciler-workspace-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("resolves artifact paths inside the project root", () => {
    expect(resolveArtifactPath(dir, "ios/Runner/Info.plist")).toBe(path.join(dir, "ios", "Runner", "Info.plist"));
  });

  it("refuses absolute and escaping artifact paths", () => {
    expect(() => resolveArtifactPath(dir, "../outside.txt")).toThrow(
      "Artifact path escapes the project root: ../outside.txt"
    );
    expect(() => resolveArtifactPath(dir, ".")).toThrow("Artifact path escapes the project root: .");
    expect(() => resolveArtifactPath(dir, path.join(dir, "a.txt"))).toThrow(
      "Artifact paths must be relative to the project root"
    );
  });

  it("requires the project root to be an existing directory", () => {
    expect(resolveProjectRoot(dir)).toBe(path.resolve(dir));
    const missing = path.join(dir, "missing");
    expect(() => resolveProjectRoot(missing)).toThrow(`Project root does not exist: ${missing}`);
    const file = path.join(dir, "file.txt");
    fs.writeFileSync(file, "x");
    expect(() => resolveProjectRoot(file)).toThrow(`Project root is not a directory: ${file}`);
  });

  it("holds the run lock for the duration of the callback", async () => {
    const lockPath = path.join(dir, ".config-reconciler.lock");
    const seen = await withRunLock(dir, async () => fs.existsSync(lockPath));
    expect(seen).toBe(true);
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it("releases the lock when the callback throws", async () => {
    await expect(withRunLock(dir, async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(fs.existsSync(path.join(dir, ".config-reconciler.lock"))).toBe(false);
  });

  it("takes over a stale lock", async () => {
    const lockPath = path.join(dir, ".config-reconciler.lock");
    fs.writeFileSync(lockPath, "{}");
    const old = new Date(Date.now() - 60 * 60 * 1000);
    fs.utimesSync(lockPath, old, old);
    await expect(withRunLock(dir, async () => "done")).resolves.toBe("done");
  });
});
