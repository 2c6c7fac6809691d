import { ToolchainMismatch } from "../errors";
import { runCommandSync } from "../platform/process-exec";
import type { ArtifactDefinition } from "../types";

export type ToolchainLint = (artifact: ArtifactDefinition, filePath: string) => ToolchainMismatch | null;

type Runner = typeof runCommandSync;

/**
 * Runs `plutil -lint` on property lists. Returns null when the file passes or
 * when plutil is not installed (anything but macOS).
 */
export function createPlutilLint(run: Runner = runCommandSync): ToolchainLint {
  let available: boolean | null = null;
  return (artifact, filePath) => {
    if (artifact.format !== "plist" || available === false) {
      return null;
    }
    const result = run("plutil", ["-lint", filePath], { timeout: 15000 });
    if (result.error) {
      available = false;
      return null;
    }
    available = true;
    if (result.status === 0) {
      return null;
    }
    const detail = `${result.stdout ?? ""}${result.stderr ?? ""}`.trim() || `exit code ${result.status}`;
    return new ToolchainMismatch(`plutil rejected ${artifact.path}: ${detail}`, filePath, "plutil");
  };
}
