import { SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns, spawnSync } from "child_process";

type RunSyncArgs = {
  timeout?: number;
};

function shouldUseWindowsShell(command: string): boolean {
  if (process.platform !== "win32") {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith(".cmd") || normalized.endsWith(".bat");
}

export function runCommandSync(command: string, args: string[], options: RunSyncArgs = {}): SpawnSyncReturns<string> {
  const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
    shell: shouldUseWindowsShell(command),
    timeout: options.timeout,
    encoding: "utf-8",
    windowsHide: process.platform === "win32"
  };
  return spawnSync(command, args, spawnOptions);
}

/** True when `command` can be spawned at all (ENOENT means it is not on PATH). */
export function commandAvailable(command: string, probeArgs: string[] = ["-help"]): boolean {
  const result = runCommandSync(command, probeArgs, { timeout: 5000 });
  return !(result.error && "code" in result.error && result.error.code === "ENOENT");
}
